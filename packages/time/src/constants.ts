/** Wall-clock units, in nanoseconds */
export const NANOSECOND = 1n;
export const MICROSECOND = NANOSECOND * 1000n;
export const MILLISECOND = MICROSECOND * 1000n;
export const SECOND = MILLISECOND * 1000n;
export const MINUTE = SECOND * 60n;
export const HOUR = MINUTE * 60n;

export const NANOS_PER_SECOND = SECOND;

/** Ticks per second of the H264 codec clock */
export const H264_TIMESCALE = 90_000;

export const H264_SECOND = BigInt(H264_TIMESCALE);
export const H264_MILLISECOND = H264_SECOND / 1000n;

/** Integer bounds */
export const I64_MIN = -(2n ** 63n);
export const I64_MAX = 2n ** 63n - 1n;
export const I32_MIN = -(2 ** 31);
export const I32_MAX = 2 ** 31 - 1;
export const U32_MAX = 2 ** 32 - 1;

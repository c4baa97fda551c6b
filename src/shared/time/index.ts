export const getMonotonicNanos = (): bigint => process.hrtime.bigint();

export const resolveTimestampNanos = (value?: bigint | number): bigint => {
  if (typeof value === "bigint") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return BigInt(Math.trunc(value));
  }
  return getMonotonicNanos();
};

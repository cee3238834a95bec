import { U128_MAX, type Balance } from "../types";

/** `undefined` when the sum leaves the u128 range. */
export const checkedAdd = (a: Balance, b: Balance): Balance | undefined => {
  const r = a + b;
  return r > U128_MAX ? undefined : r;
};

/** `undefined` on underflow. */
export const checkedSub = (a: Balance, b: Balance): Balance | undefined => {
  const r = a - b;
  return r < 0n ? undefined : r;
};

export const isU128 = (n: bigint): boolean => n >= 0n && n <= U128_MAX;

export const assertU128 = (n: bigint, what: string): void => {
  if (!isU128(n)) throw new RangeError(`${what} out of u128 range: ${n}`);
};

/* ─── Primitives ─── */
export type AccountId = string;
export type Balance = bigint; // unsigned 128-bit
export type Timestamp = bigint; // unix-ms, unsigned 128-bit
export type Hash = string; // hex BLAKE2s-256
export type PublicKey = Uint8Array; // 32-byte Ed25519
export type SecretKey = Uint8Array;
export type Signature = Uint8Array; // 64-byte Ed25519

export const U128_MAX = 2n ** 128n - 1n;

/* ─── Result ─── */
export type Result<T, E> = { _tag: "Ok"; value: T } | { _tag: "Err"; error: E };
export const Ok = <T>(value: T): Result<T, never> => ({ _tag: "Ok", value });
export const Err = <E>(error: E): Result<never, E> => ({ _tag: "Err", error });
export const isOk = <T, E>(r: Result<T, E>): r is { _tag: "Ok"; value: T } =>
  r._tag === "Ok";
export const isErr = <T, E>(r: Result<T, E>): r is { _tag: "Err"; error: E } =>
  r._tag === "Err";

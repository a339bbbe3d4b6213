/**
 * Prepended by an adapter to every key it sends to a shared backend.
 *
 * @remarks
 * Separate from a ring's key prefix: ring keys stay `users:1` in logs and in
 * `ring.key()`, while two deployments sharing one Redis can write
 * `tenant-a:users:1` and `tenant-b:users:1`.
 */
export type KeyspacePrefix = string

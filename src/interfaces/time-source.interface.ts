/**
 * Supplies the current instant as signed 64-bit nanoseconds.
 *
 * A realtime clock keeps limits correct across process failover but follows
 * operator clock changes. A monotonic clock ignores clock changes but starts
 * over with every process.
 */
export interface TimeSource {
  now(): bigint;
}

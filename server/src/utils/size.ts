const BYTES_PER_MB = 1024 * 1024

/** Bytes as mebibytes with one decimal, e.g. 31666995 -> "30.2". */
export function formatMegabytes(bytes: number): string {
  return (bytes / BYTES_PER_MB).toFixed(1)
}

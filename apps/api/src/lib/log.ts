/** Console line prefixed with the UTC wall-clock time, e.g. `[09:41:07] ...`. */
export function log(message: string) {
  const timestamp = new Date().toISOString().slice(11, 19)
  console.log(`[${timestamp}] ${message}`)
}

export function logError(message: string) {
  const timestamp = new Date().toISOString().slice(11, 19)
  console.error(`[${timestamp}] ${message}`)
}

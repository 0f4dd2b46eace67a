function clock() {
  return new Date().toISOString().split('T')[1]?.split('.')[0] ?? ''
}

export function log(message: string, ...details: string[]) {
  console.log(`[${clock()}] ${message}`, ...details)
}

export function logError(message: string, error: unknown) {
  console.error(`[${clock()}] ERROR: ${message}`, error)
}

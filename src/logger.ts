export const DEV_LOG =
  process.env.NODE_ENV === 'development' ||
  process.env.DEV_LOG === '1' ||
  process.env.DEV_LOG === 'true' ||
  !!process.env.TEST

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`
  return {
    debug: (...args) => {
      if (DEV_LOG) console.debug('[debug]', tag, ...args)
    },
    info: (...args) => console.info('[info]', tag, ...args),
    warn: (...args) => console.warn('[warn]', tag, ...args),
    error: (...args) => console.error('[error]', tag, ...args)
  }
}


// engine/logger.ts
// Structured JSON console logging shared by api/, scripts/ and the engine.

type LogLevel = 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3
};

function currentThreshold(): number {
  const raw = (process.env.ELP_LOG_LEVEL ?? '').trim().toLowerCase();
  if (raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
    return LEVEL_RANK[raw];
  }
  return LEVEL_RANK.info;
}

function emit(level: LogLevel, event: string, ctx: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < currentThreshold()) return;

  const line = JSON.stringify({ level, service: 'elp-engine', event, ...ctx });
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.info(line);
  }
}

export function logInfo(event: string, ctx: Record<string, unknown> = {}): void {
  emit('info', event, ctx);
}

export function logWarn(event: string, ctx: Record<string, unknown> = {}): void {
  emit('warn', event, ctx);
}

export function logError(event: string, ctx: Record<string, unknown> = {}): void {
  emit('error', event, ctx);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function isVerboseModeEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.CONFIDENCE_VERBOSE);
}

export function isTelemetryDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.CONFIDENCE_NO_TELEMETRY);
}

export function readLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return String(env.CONFIDENCE_LOG_LEVEL ?? '').toLowerCase().trim();
}

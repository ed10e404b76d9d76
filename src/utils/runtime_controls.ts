export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function isTelemetryDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.PROVENANT_NO_TELEMETRY);
}

export function isVerbose(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.PROVENANT_VERBOSE);
}

/**
 * Editor launching is skipped in CI and when explicitly disabled, so
 * `evidence open` degrades to printing the location.
 */
export function isEditorLaunchDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.PROVENANT_NO_EDITOR) || isTruthyFlag(env.CI);
}

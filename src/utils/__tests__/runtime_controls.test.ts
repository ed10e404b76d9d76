import { describe, expect, it } from 'vitest';
import { isEditorLaunchDisabled, isTelemetryDisabled, isTruthyFlag, isVerbose } from '../runtime_controls.js';

describe('runtime controls', () => {
  it('parses truthy flags', () => {
    expect(isTruthyFlag('1')).toBe(true);
    expect(isTruthyFlag(' Yes ')).toBe(true);
    expect(isTruthyFlag('on')).toBe(true);
    expect(isTruthyFlag('0')).toBe(false);
    expect(isTruthyFlag('')).toBe(false);
    expect(isTruthyFlag(undefined)).toBe(false);
  });

  it('reads telemetry and verbosity switches from the given env', () => {
    expect(isTelemetryDisabled({ PROVENANT_NO_TELEMETRY: 'true' })).toBe(true);
    expect(isTelemetryDisabled({})).toBe(false);
    expect(isVerbose({ PROVENANT_VERBOSE: '1' })).toBe(true);
    expect(isVerbose({})).toBe(false);
  });

  it('disables editor launch in CI or on request', () => {
    expect(isEditorLaunchDisabled({ CI: 'true' })).toBe(true);
    expect(isEditorLaunchDisabled({ PROVENANT_NO_EDITOR: '1' })).toBe(true);
    expect(isEditorLaunchDisabled({})).toBe(false);
  });
});

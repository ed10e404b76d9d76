import { runBuiltin } from './builtin.js';
import { runProcess } from './process_adapter.js';
import type { AdapterRequest, AdapterSettings, StepRunner } from './types.js';

export function fabricArgs(pattern: string, model?: string): string[] {
  const args = ['-p', pattern];
  if (model) args.push('-m', model);
  return args;
}

/**
 * Dispatch on the step's adapter variant. `builtin` and `fabric` are the
 * closed set; `exec` runs any command that honours the stdin/stdout contract.
 */
export function createStepRunner(settings: AdapterSettings): StepRunner {
  return async (request: AdapterRequest): Promise<string> => {
    const { step } = request;
    switch (step.adapter) {
      case 'builtin':
        return runBuiltin(step.action, request.input, request.cwd);
      case 'fabric':
        return runProcess({
          command: settings.fabricBinary,
          args: fabricArgs(step.pattern, step.model),
          input: request.input,
          timeoutMs: request.timeoutMs,
          cwd: request.cwd,
          env: settings.env,
        });
      case 'exec':
        return runProcess({
          command: step.command,
          args: step.args,
          input: request.input,
          timeoutMs: request.timeoutMs,
          cwd: request.cwd,
          env: settings.env,
        });
    }
  };
}

import { createStepRunner } from '../adapters/step_runner.js';
import { resolveConfig, type ProvenantConfig } from '../config/config.js';
import { EventLog } from '../core/event_log.js';
import { Orchestrator } from '../core/orchestrator.js';
import { ContentCatalog } from '../library/catalog.js';

export interface CliRuntime {
  config: ProvenantConfig;
  eventLog: EventLog;
  catalog: ContentCatalog;
  orchestrator: Orchestrator;
}

/** Wire the stores and orchestrator for one CLI invocation rooted at `workspace`. */
export async function createRuntime(workspace: string): Promise<CliRuntime> {
  const config = await resolveConfig({ cwd: workspace });
  const eventLog = new EventLog(config.runsDir);
  const catalog = new ContentCatalog(config.homeDir, config.libraryDir);
  const orchestrator = new Orchestrator({
    eventLog,
    catalog,
    runStep: createStepRunner({ fabricBinary: config.fabricBinary }),
    safety: config.safety,
    cwd: workspace,
  });
  return { config, eventLog, catalog, orchestrator };
}

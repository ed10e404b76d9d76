/**
 * @fileoverview Help text for the provenant CLI
 */

const HELP_TEXT = {
  main: `
provenant: event-sourced content pipelines with byte-exact evidence

USAGE:
    provenant <command> [options]

COMMANDS:
    run <pipeline>          Run a pipeline against an input
    status <run_id>         Show a run's state, replayed from its event log
    resume <run_id>         Continue a failed or interrupted run
    runs                    List recent runs
    ingest <source>         Add a source to the content catalog
    catalog <subcommand>    List, search, look up or remove catalog entries
    evidence <subcommand>   Show, open, validate or ground evidence
    help [command]          Show help for a command

GLOBAL OPTIONS:
    -w, --workspace <dir>   Directory to resolve config and pipelines from (default: cwd)
    --verbose               Log progress to stderr
    --json                  Machine-readable output on stdout; logs are silenced
    -v, --version           Print the version

ENVIRONMENT:
    PROVENANT_HOME          State directory (default: ~/.provenant)
    PROVENANT_LIBRARY       Content library (default: $PROVENANT_HOME/library)
    PROVENANT_LOG_LEVEL     debug | info | warn | error | silent
    PROVENANT_FABRIC_BIN    fabric executable (default: fabric)
    PROVENANT_EDITOR        Editor for 'evidence open' (default: code)
`,
  run: `
provenant run <pipeline> [options]

Runs every step of a pipeline in order. <pipeline> is a path to a JSON file
or a name looked up as <name>.json in the configured pipeline directories
(./pipelines and $PROVENANT_HOME/pipelines by default).

OPTIONS:
    --input <file>      Read the run input from a file
    --text <text>       Use the given text as run input
    --stdin             Read the run input from stdin (default when stdin is piped)
    --source <id>       Canonical source (URL or id); on success the outputs are
                        deposited in the content catalog and evidence is grounded
    --title <title>     Catalog title for the source
    --tag <tag>         Catalog tag (repeatable)
    --json              Print the final run state as JSON

EXAMPLES:
    provenant run wisdom --input transcript.txt --source https://example.com/talk
    cat notes.txt | provenant run summarize
`,
  status: `
provenant status <run_id> [--json]

Replays the run's event log and prints its state and per-step progress.
`,
  resume: `
provenant resume <run_id> [--json]

Re-enters a failed or interrupted run at the first step without a
StepCompleted event. Completed steps are not re-run; their recorded outputs
feed the next step. Completed runs are left unchanged. Runs stopped by a
safety limit cannot be resumed.
`,
  runs: `
provenant runs [--limit N] [--json]

Lists runs, most recent first (default limit: 10).
`,
  ingest: `
provenant ingest <source> [--title <title>] [--type web|youtube|other] [--tag <tag>] [--json]

Registers a source in the catalog. The content id is the first 16 hex digits
of sha256(source); ingesting the same source again only updates last_seen.
`,
  catalog: `
provenant catalog list [--limit N] [--json]
provenant catalog search <query> [--json]
provenant catalog lookup <content_id> [--json]
provenant catalog remove <content_id> [--json]

Search is a case-insensitive substring match over title, source and tags.
'remove' drops the index entry and keeps the content folder.
`,
  evidence: `
provenant evidence show <evidence_id> [--json]
provenant evidence open <evidence_id>
provenant evidence validate <content_id> [--slow-path] [--json]
provenant evidence ground <content_id> --artifact <file> --claims <file|-> [--extractor <name>] [--entities] [--json]

show      Print the claim, status, 1-indexed line:column, snippet, anchor and timestamp
open      Open the span in the editor (code -g file:line:col); prints it when that fails
validate  Check every span against the current artifacts; drifted rows are reported
          as stale and never modified
ground    Resolve an extractor's claims (JSON array, {"claims": [...]} or JSON lines)
          against an artifact in the content folder and append new evidence rows

Evidence ids may be abbreviated to a unique prefix of at least 4 characters.
`,
  help: `
provenant help [command]
`,
};

const EXIT_CODES_SECTION = `
EXIT CODES:
    0  Success
    1  General error
    2  Invalid arguments, pipeline or config
    3  Pipeline failed after retries; 'provenant resume <run_id>' can continue it
    4  A safety limit stopped the run

    In --json mode errors are printed to stderr as {"error": {"code", "message", ...}}.
`;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return value in HELP_TEXT;
}

function renderHelp(command?: string): string {
  const topic: HelpTopic = command && isHelpTopic(command) ? command : 'main';
  const body = `${HELP_TEXT[topic].trimEnd()}\n${EXIT_CODES_SECTION}`;
  if (command && !isHelpTopic(command)) {
    return `Unknown command: ${command}\n${body}`;
  }
  return body;
}

export function showHelp(command?: string): void {
  console.log(renderHelp(command));
}

export function getCommandHelp(command: string): string {
  return renderHelp(command);
}

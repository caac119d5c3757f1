/**
 * Azure DNS PTR — CLI
 *
 * `azure-dns-ptr` commands that drive the PTR record adapter against a
 * JSON desired-state file and a JSON state file.
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError, Option } from "commander";
import { resolveConfig, type DnsPtrConfig } from "./config.js";
import { createCredentialsManagerFromConfig } from "./credentials/index.js";
import { enableDnsDiagnostics, formatDnsDiagnosticEvent, onDnsDiagnosticEvent } from "./diagnostics.js";
import { AzureDnsService } from "./dns/service.js";
import type { DnsService } from "./dns/types.js";
import { ValidationError, formatErrorMessage } from "./errors.js";
import { PtrRecordAdapter, isSamePtrRecord } from "./ptr-record/adapter.js";
import { validatePtrRecordDesired } from "./ptr-record/schema.js";
import { FilePtrRecordState } from "./ptr-record/state.js";
import type { PtrRecordRemote } from "./ptr-record/types.js";
import { parsePtrRecordId } from "./resource-id.js";
import { AZURE_CREDENTIAL_METHODS, createConsoleLogger, type DnsLogger } from "./types.js";

export const DEFAULT_STATE_FILE = "ptr-record.state.json";

// Theme helper for CLI output
export const theme = {
  error: (s: string) => `\x1b[31m${s}\x1b[0m`,
} as const;

export type PtrCliDeps = {
  /** Build the DNS service from resolved configuration. */
  createService: (config: DnsPtrConfig, logger: DnsLogger) => DnsService;
  logger: DnsLogger;
  /** Command output (records, IDs); defaults to stdout. */
  out: (line: string) => void;
  env: NodeJS.ProcessEnv;
};

type GlobalOptions = {
  subscription?: string;
  tenant?: string;
  credentialMethod?: string;
  diagnostics?: boolean;
  verbose?: boolean;
};

type StateOptions = {
  state: string;
};

export function createAzureDnsService(config: DnsPtrConfig, logger: DnsLogger): DnsService {
  if (!config.subscriptionId) {
    throw new ValidationError("Azure subscription ID is required (--subscription or AZURE_SUBSCRIPTION_ID)");
  }
  if (config.diagnostics?.enabled) {
    // failed calls always, successful ones only when verbose
    const verbose = config.diagnostics.verbose === true;
    enableDnsDiagnostics();
    onDnsDiagnosticEvent((event) => {
      if (event.type === "dns.api.call" && !verbose) return;
      logger.debug?.(formatDnsDiagnosticEvent(event));
    });
  }
  return new AzureDnsService(createCredentialsManagerFromConfig(config), config.subscriptionId);
}

function readJsonFile(path: string): unknown {
  return JSON.parse(readFileSync(path, "utf-8"));
}

function formatRecord(remote: PtrRecordRemote): string {
  return JSON.stringify(remote, null, 2);
}

/**
 * Build the program. Failures are reported through the logger and
 * recorded as a non-zero exit code rather than thrown.
 */
export function createPtrCli(overrides: Partial<PtrCliDeps> = {}): { program: Command; exitCode: () => number } {
  const logger = overrides.logger ?? createConsoleLogger();
  const deps: PtrCliDeps = {
    createService: overrides.createService ?? createAzureDnsService,
    logger,
    out: overrides.out ?? ((line) => console.log(line)),
    env: overrides.env ?? process.env,
  };
  let exitCode = 0;

  const program = new Command("azure-dns-ptr")
    .description("Manage an Azure DNS PTR record set declaratively")
    .option("--subscription <id>", "Azure subscription ID")
    .option("--tenant <id>", "Azure AD tenant ID")
    .addOption(new Option("--credential-method <method>", "Credential method").choices(AZURE_CREDENTIAL_METHODS))
    .option("--diagnostics", "Log failed Azure DNS API calls")
    .option("-v, --verbose", "Log every Azure DNS API call")
    .configureOutput({
      writeOut: (s) => deps.out(s.trimEnd()),
      writeErr: (s) => deps.logger.error(s.trimEnd()),
    })
    .exitOverride();

  const adapter = (): PtrRecordAdapter => {
    const globals = program.opts<GlobalOptions>();
    const raw: Record<string, unknown> = {};
    if (globals.subscription) raw.subscriptionId = globals.subscription;
    if (globals.tenant) raw.tenantId = globals.tenant;
    if (globals.credentialMethod) raw.credentialMethod = globals.credentialMethod;
    if (globals.diagnostics || globals.verbose) {
      raw.diagnostics = { enabled: true, verbose: globals.verbose === true };
    }

    const config = resolveConfig(raw, deps.env);
    return new PtrRecordAdapter(deps.createService(config, deps.logger), { logger: deps.logger });
  };

  const run = (label: string, fn: () => Promise<void>) => async () => {
    try {
      await fn();
    } catch (error) {
      deps.logger.error(theme.error(`${label}: ${formatErrorMessage(error)}`));
      exitCode = 1;
    }
  };

  program
    .command("apply")
    .description("Create or update the PTR record set described by a JSON file")
    .argument("<config>", "Desired state JSON file")
    .option("-s, --state <file>", "State file", DEFAULT_STATE_FILE)
    .action((configPath: string, options: StateOptions) =>
      run("Failed to apply DNS PTR record", async () => {
        const desired = readJsonFile(configPath);
        validatePtrRecordDesired(desired);
        const state = FilePtrRecordState.load(options.state);
        const ptr = adapter();

        // refresh first so the cached etag reflects out-of-band changes
        await ptr.read(state);

        const trackedId = state.getId();
        if (trackedId && !isSamePtrRecord(parsePtrRecordId(trackedId), desired)) {
          deps.logger.info(`Replacing ${trackedId}: name, zone or resource group changed`);
          await ptr.delete(state);
          state.clear();
        }

        await ptr.createOrUpdate(desired, state);
        deps.out(state.getId() ?? "");
      })(),
    );

  program
    .command("show")
    .description("Read the tracked PTR record set and refresh the state file")
    .option("-s, --state <file>", "State file", DEFAULT_STATE_FILE)
    .action((options: StateOptions) =>
      run("Failed to read DNS PTR record", async () => {
        const state = FilePtrRecordState.load(options.state);
        const remote = await adapter().read(state);
        deps.out(remote ? formatRecord(remote) : "DNS PTR record not found");
      })(),
    );

  program
    .command("destroy")
    .description("Delete the tracked PTR record set")
    .option("-s, --state <file>", "State file", DEFAULT_STATE_FILE)
    .action((options: StateOptions) =>
      run("Failed to delete DNS PTR record", async () => {
        const state = FilePtrRecordState.load(options.state);
        const id = state.getId();
        if (!id) {
          throw new Error(`No DNS PTR record is tracked in ${options.state}`);
        }
        await adapter().delete(state);
        state.clear();
        deps.out(`Deleted ${id}`);
      })(),
    );

  program
    .command("import")
    .description("Start tracking an existing PTR record set by its Azure resource ID")
    .argument("<id>", "Azure resource ID of the record set")
    .option("-s, --state <file>", "State file", DEFAULT_STATE_FILE)
    .action((id: string, options: StateOptions) =>
      run("Failed to import DNS PTR record", async () => {
        const state = FilePtrRecordState.load(options.state);
        const ptr = adapter();
        ptr.import(id, state);
        const remote = await ptr.read(state);
        if (!remote) {
          throw new Error(`DNS PTR record ${id} does not exist`);
        }
        deps.out(formatRecord(remote));
      })(),
    );

  return { program, exitCode: () => exitCode };
}

/**
 * Parse argv (user arguments only) and run one command. Returns the exit code.
 */
export async function runPtrCli(args: string[], overrides?: Partial<PtrCliDeps>): Promise<number> {
  const { program, exitCode } = createPtrCli(overrides);
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }
  return exitCode();
}

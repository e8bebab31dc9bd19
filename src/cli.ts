import { Command, CommanderError } from "commander";
import { z } from "zod";
import { ApiClient } from "./apiClient.js";
import { resolveToken, TokenStore } from "./auth.js";
import { runLogin, runLogout, runStatus, type AuthContext } from "./commands/auth.js";
import { runCreate, runDelete, runList, runShow, runUpdate, type CommandContext } from "./commands/resources.js";
import { config } from "./config.js";
import { exitCodeFor, normalizeError, UsageError } from "./errors.js";
import { logger } from "./logger.js";
import { processIo, type Io } from "./output.js";
import { registeredViewTypes } from "./views/index.js";

export const VERSION = "0.1.0";

export type ProgramDeps = {
  io?: Io;
  store?: TokenStore;
  fetch?: typeof fetch;
  envToken?: string;
  apiPrefix?: string;
};

const globalsSchema = z.object({
  baseUrl: z.string().url(),
  token: z.string().optional(),
  auth: z.boolean().default(true),
  json: z.boolean().optional()
});

const collect = (value: string, previous: string[]) => [...previous, value];

// Commander's argv rejections, mapped to the usage exit code.
const usageErrorCodes = new Set([
  "commander.missingArgument",
  "commander.optionMissingArgument",
  "commander.missingMandatoryOptionValue",
  "commander.conflictingOption",
  "commander.unknownOption",
  "commander.unknownCommand",
  "commander.excessArguments",
  "commander.invalidArgument"
]);

const commanderExitCode = (err: CommanderError) => {
  if (usageErrorCodes.has(err.code)) return 2;
  return err.exitCode;
};

const readGlobals = (command: Command) => {
  const parsed = globalsSchema.safeParse(command.optsWithGlobals());
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UsageError(`Invalid --${issue?.path.join(".") ?? "option"}: ${issue?.message ?? "invalid value"}`);
  }
  return parsed.data;
};

const addSparseOptions = (command: Command) =>
  command
    .option("--fields <type=fields>", "Sparse fieldset, e.g. brokers=company-name,status (repeatable)", collect, [])
    .option("--include <paths>", "Related resources to include, comma-separated (repeatable)", collect, [])
    .option("--sparse", "Echo the response generically instead of using the resource view");

const addWriteOptions = (command: Command) =>
  command
    .option("--attr <name=value>", "Attribute to set; JSON values are parsed (repeatable)", collect, [])
    .option("--rel <name=type:id>", "Relationship to set; empty value clears it (repeatable)", collect, []);

export const reportError = (io: Io, err: unknown) => {
  const normalized = normalizeError(err);
  if (normalized.body) {
    io.stderr.write(`${normalized.body}\n`);
  }
  io.stderr.write(`Error: ${normalized.message}\n`);
  return exitCodeFor(err);
};

export const createProgram = (deps: ProgramDeps = {}) => {
  const io = deps.io ?? processIo;
  const store = deps.store ?? new TokenStore(config.configDir);
  const envToken = "envToken" in deps ? deps.envToken : config.token;
  const apiPrefix = deps.apiPrefix ?? config.apiPrefix;

  const commandContext = async (command: Command): Promise<CommandContext> => {
    const globals = readGlobals(command);
    const resolved = globals.auth
      ? await resolveToken({ baseUrl: globals.baseUrl, explicit: globals.token, envToken, store })
      : { token: undefined, source: "none" as const };
    logger.debug({ baseUrl: globals.baseUrl, tokenSource: resolved.source }, "Resolved API credentials");

    return {
      client: new ApiClient({ baseUrl: globals.baseUrl, token: resolved.token, fetch: deps.fetch }),
      io,
      apiPrefix
    };
  };

  const authContext = (command: Command): AuthContext => ({
    io,
    store,
    baseUrl: readGlobals(command).baseUrl,
    envToken
  });

  const viewHelp = `\nDedicated views: ${registeredViewTypes().join(", ")}. Other types use the generic view.`;

  const program = new Command();
  program
    .name("hyperdoc")
    .description("Query and edit resources on a JSON:API backend")
    .version(VERSION)
    .option("--base-url <url>", "API base URL", config.baseUrl)
    .option("--token <token>", "API token (overrides stored credentials)")
    .option("--no-auth", "Disable auth token lookup")
    .option("--json", "Output JSON")
    .option("--omit-null", "Omit null values in JSON output")
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text)
    })
    .exitOverride();

  addSparseOptions(
    program
      .command("list")
      .description("List resources of a type")
      .argument("<type>", "Resource type, e.g. brokers")
      .option("--limit <n>", "Page size")
      .option("--offset <n>", "Page offset")
      .option("--sort <fields>", "Sort fields, e.g. -created-at")
      .option("--filter <name=value>", "Filter, sent as filter[name] (repeatable)", collect, [])
      .addHelpText("after", viewHelp)
  ).action(async (type: string, _options: unknown, command: Command) => {
    await runList(await commandContext(command), type, command.optsWithGlobals());
  });

  addSparseOptions(
    program
      .command("show")
      .description("Show one resource")
      .argument("<type>", "Resource type")
      .argument("<id>", "Resource id")
      .addHelpText("after", viewHelp)
  ).action(async (type: string, id: string, _options: unknown, command: Command) => {
    await runShow(await commandContext(command), type, id, command.optsWithGlobals());
  });

  addWriteOptions(
    program.command("create").description("Create a resource").argument("<type>", "Resource type")
  ).action(async (type: string, _options: unknown, command: Command) => {
    await runCreate(await commandContext(command), type, command.optsWithGlobals());
  });

  addWriteOptions(
    program
      .command("update")
      .description("Update a resource")
      .argument("<type>", "Resource type")
      .argument("<id>", "Resource id")
  ).action(async (type: string, id: string, _options: unknown, command: Command) => {
    await runUpdate(await commandContext(command), type, id, command.optsWithGlobals());
  });

  program
    .command("delete")
    .description("Delete a resource")
    .argument("<type>", "Resource type")
    .argument("<id>", "Resource id")
    .option("--confirm", "Confirm the deletion")
    .action(async (type: string, id: string, _options: unknown, command: Command) => {
      await runDelete(await commandContext(command), type, id, command.optsWithGlobals());
    });

  const auth = program.command("auth").description("Manage stored API tokens");

  auth
    .command("login")
    .description("Store a token for the base URL")
    .action(async (_options: unknown, command: Command) => {
      await runLogin(authContext(command), readGlobals(command).token);
    });

  auth
    .command("logout")
    .description("Remove the stored token for the base URL")
    .action(async (_options: unknown, command: Command) => {
      await runLogout(authContext(command));
    });

  auth
    .command("status")
    .description("Show which token would be used")
    .action(async (_options: unknown, command: Command) => {
      const globals = readGlobals(command);
      await runStatus(authContext(command), { explicit: globals.token, json: globals.json });
    });

  return program;
};

/** Parses argv and runs the command; resolves to the process exit code. */
export const runCli = async (argv: string[], deps: ProgramDeps = {}) => {
  const io = deps.io ?? processIo;
  const program = createProgram(deps);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return commanderExitCode(err);
    }
    logger.debug({ err }, "Command failed");
    return reportError(io, err);
  }
};

/**
 * Command definitions for the userstore CLI
 */

import {
  Command,
  CommanderError,
  InvalidArgumentError,
  type OutputConfiguration,
} from "commander";
import { createInterface } from "node:readline/promises";
import { resolveDataFile, isVerbose } from "./lib/env.js";
import { parseId, parseJson, pickDefined } from "./lib/arg.js";
import { readStdin, readJsonFromFile, isStdinTTY } from "./lib/io.js";
import { printJson, printStatus, colorize } from "./lib/render.js";
import { CliError, mapStoreErrorToExitCode, formatCliError } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";
import { initDataFile, withCliStore } from "./lib/store.js";

export const VERSION = "0.1.0";

type GlobalOptions = {
  file?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface AddOptions {
  id?: string;
  name?: string;
  email?: string;
  phone?: string;
  data?: string;
  fileInput?: string;
}

/**
 * Resolve the create payload from field flags, --data, --file-input or stdin
 */
async function readRecordInput(options: AddOptions): Promise<unknown> {
  const fields = pickDefined({
    id: options.id,
    name: options.name,
    email: options.email,
    phone: options.phone,
  });
  const hasFields = Object.keys(fields).length > 0;

  const sources = [hasFields, options.data !== undefined, options.fileInput !== undefined];
  if (sources.filter(Boolean).length > 1) {
    throw new InvalidArgumentError(
      "Use only one of the field flags, --data or --file-input; or pipe JSON to stdin"
    );
  }

  if (hasFields) {
    return fields;
  }
  if (options.data !== undefined) {
    return parseJson(options.data, "--data");
  }
  if (options.fileInput !== undefined) {
    return readJsonFromFile(options.fileInput);
  }

  if (isStdinTTY()) {
    throw new InvalidArgumentError(
      "No input provided. Use --name, --data, --file-input, or pipe JSON to stdin"
    );
  }

  let stdin: string;
  try {
    stdin = await readStdin();
  } catch (err) {
    throw new InvalidArgumentError(
      err instanceof Error ? err.message : "Failed to read from stdin"
    );
  }
  if (!stdin.trim()) {
    throw new InvalidArgumentError("stdin is empty");
  }
  return parseJson(stdin, "stdin");
}

async function confirmRemoval(id: string): Promise<void> {
  if (!isStdinTTY()) {
    throw new InvalidArgumentError("Use --force to confirm removal in non-interactive mode");
  }

  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = (await rl.question(`Remove user ${id}? (y/N) `)).trim().toLowerCase();
    if (answer !== "y") {
      throw new CliError("Aborted by user", { exitCode: 1 });
    }
  } finally {
    rl.close();
  }
}

/**
 * Build the command tree. Errors are thrown, never turned into process.exit,
 * so a program can be run in-process.
 */
export function createProgram(output?: OutputConfiguration): Command {
  const program = new Command();

  const settings = () => {
    const opts = program.opts<GlobalOptions>();
    return {
      file: resolveDataFile(opts.file),
      verbose: opts.verbose === true || isVerbose(),
      quiet: opts.quiet === true,
    };
  };

  program
    .configureOutput({
      writeErr: (str) => process.stderr.write(colorize(str, "red", process.stderr)),
      ...output,
    })
    .exitOverride();

  program
    .name("userstore")
    .description("Manage user records kept in a single JSON file")
    .version(VERSION)
    .option("--file <path>", "Data file (default: $USERSTORE_FILE or ./data/users.json)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  program
    .command("init")
    .description("Create the data file with an empty collection")
    .action(async () => {
      const { file, verbose, quiet } = settings();
      await withTiming("cli.init", verbose, async () => {
        await initDataFile(file);
        printStatus(`Initialized ${file}`, { quiet });
      });
    });

  program
    .command("list")
    .description("Print all users")
    .option("--raw", "Output compact JSON")
    .action(async (options: { raw?: boolean }) => {
      const { file, verbose } = settings();
      await withTiming("cli.list", verbose, async () => {
        const users = await withCliStore(file, (store) => store.list());
        printJson(users, { raw: options.raw });
      });
    });

  program
    .command("get")
    .description("Print one user")
    .argument("<id>", "User identifier", parseId)
    .option("--raw", "Output compact JSON")
    .action(async (id: string, options: { raw?: boolean }) => {
      const { file, verbose } = settings();
      await withTiming("cli.get", verbose, async () => {
        const user = await withCliStore(file, (store) => store.get(id));

        if (user === null) {
          throw new CliError(`User not found: ${id}`, { exitCode: 2 });
        }

        printJson(user, { raw: options.raw });
      });
    });

  program
    .command("add")
    .description("Create a user and print it")
    .option("--id <id>", "Identifier (generated when omitted)", parseId)
    .option("--name <name>", "Display name")
    .option("--email <email>", "E-mail address")
    .option("--phone <phone>", "Phone number")
    .option("--data <json>", "Inline JSON record")
    .option("--file-input <path>", "Read the record from a JSON file")
    .action(async (options: AddOptions) => {
      const { file, verbose } = settings();
      await withTiming("cli.add", verbose, async () => {
        const payload = await readRecordInput(options);
        const user = await withCliStore(file, (store) => store.create(store.parseInput(payload)));
        printJson(user);
      });
    });

  program
    .command("rm")
    .description("Remove a user")
    .argument("<id>", "User identifier", parseId)
    .option("--force", "Skip the confirmation prompt")
    .action(async (id: string, options: { force?: boolean }) => {
      const { file, verbose, quiet } = settings();
      await withTiming("cli.rm", verbose, async () => {
        if (!options.force) {
          await confirmRemoval(id);
        }

        await withCliStore(file, (store) => store.delete(id));
        printStatus(`Removed ${id}`, { quiet });
      });
    });

  return program;
}

/**
 * Parse user arguments and run the matching command
 * @returns Process exit code
 */
export async function run(argv: readonly string[], program = createProgram()): Promise<number> {
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Usage errors, help and version output have already been written by commander
    if (err instanceof CommanderError && !(err instanceof InvalidArgumentError)) {
      return err.exitCode;
    }

    const opts = program.opts<GlobalOptions>();
    const verbose = opts.verbose === true || isVerbose();
    console.error(`Error: ${formatCliError(err, verbose)}`);

    return mapStoreErrorToExitCode(err);
  }
}

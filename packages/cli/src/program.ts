/**
 * modelkv command line program
 *
 * Commands run in process against one store handle per invocation, so the
 * same program backs the `modelkv` binary and the tests.
 */

import { Command, CommanderError } from "commander";
import { ModelInstance, NotFoundError, type Properties } from "@modelkv/sdk";
import { openCliStore, type CliStore } from "./lib/store.js";
import { isVerbose, resolveBackend, resolveSchemaPath } from "./lib/env.js";
import { loadSchema } from "./lib/schema.js";
import { parseJson, parseLookupValue, parseModelId, parseProperties } from "./lib/arg.js";
import { processIO, readJsonFromFile, type CliIO } from "./lib/io.js";
import { colorize, printJson, printLines } from "./lib/render.js";
import { CliError, formatCliError, mapSdkErrorToExitCode } from "./lib/errors.js";
import { withTiming } from "./lib/telemetry.js";

export const VERSION = "0.1.0";

type GlobalOptions = {
  root?: string;
  redis?: string;
  schema?: string;
  verbose?: boolean;
  quiet?: boolean;
};

interface InputOptions {
  file?: string;
  data?: string;
}

// Errors commander has already printed
const reported = new WeakSet<Error>();

/**
 * Properties for `put`, from --file, --data or stdin
 */
async function readProperties(io: CliIO, options: InputOptions): Promise<Properties> {
  if (options.file !== undefined && options.data !== undefined) {
    throw new CliError("Cannot use both --file and --data; choose one or use stdin");
  }

  if (options.file !== undefined) {
    return parseProperties(await readJsonFromFile(options.file), `file ${options.file}`);
  }
  if (options.data !== undefined) {
    return parseProperties(parseJson(options.data, "--data"), "--data");
  }

  if (io.isStdinTTY()) {
    throw new CliError("No input provided. Use --file, --data, or pipe JSON to stdin");
  }
  let stdin: string;
  try {
    stdin = await io.readStdin(); // Size limit enforced during streaming
  } catch (err) {
    throw new CliError(err instanceof Error ? err.message : "Failed to read from stdin", { cause: err });
  }
  if (!stdin.trim()) {
    throw new CliError("stdin is empty");
  }
  return parseProperties(parseJson(stdin, "stdin"), "stdin");
}

function summarize(instance: ModelInstance): { id: number | null; properties: Properties } {
  return { id: instance.id, properties: instance.toJSON() };
}

/**
 * Build the program; output goes through `io`
 */
export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  // Configure error output with color; commander errors are thrown, never exit the process
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.color)),
    })
    .exitOverride((err) => {
      reported.add(err);
      throw err;
    });

  // Global options
  program
    .name("modelkv")
    .description("modelkv - objects with unique properties on key-value stores")
    .version(VERSION)
    .option("--root <path>", "File store root directory")
    .option("--redis <url>", "Redis server URL")
    .option("--schema <file>", "Model declarations (JSON)")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  /**
   * Run a command body against the store selected by the global options
   */
  async function withStore<T>(label: string, fn: (store: CliStore, opts: GlobalOptions) => Promise<T>): Promise<T> {
    return withTiming(
      label,
      async () => {
        const opts = program.opts<GlobalOptions>();
        const backend = resolveBackend(opts);
        const declarations = await loadSchema(resolveSchemaPath(opts.schema));
        const store = openCliStore(backend, declarations);
        try {
          return await fn(store, opts);
        } finally {
          await store.close();
        }
      },
      io.stderr
    );
  }

  // Put command
  program
    .command("put <model>")
    .description("Create an object, or overwrite an existing one with --id")
    .option("--id <id>", "Overwrite the object with this id", (value: string) => parseModelId(value, "--id"))
    .option("--file <path>", "Read properties from JSON file")
    .option("--data <json>", "Inline JSON properties")
    .action(async (modelName: string, options: InputOptions & { id?: number }) => {
      const properties = await readProperties(io, options);

      await withStore("cli.put", async (store, opts) => {
        const model = store.model(modelName);

        let instance: ModelInstance;
        if (options.id === undefined) {
          instance = model.create(properties);
        } else {
          if ((await model.get(options.id)) === null) {
            throw new NotFoundError(model.name, `id ${options.id}`);
          }
          instance = new ModelInstance(model, properties, options.id);
        }

        const result = await instance.put();
        if (!result.ok) {
          throw result.error;
        }

        if (!opts.quiet) {
          printLines(io, [String(result.id)]);
        }
      });
    });

  // Get command
  program
    .command("get <model> <id>")
    .description("Retrieve an object by id")
    .option("--raw", "Output raw JSON without formatting")
    .action(async (modelName: string, rawId: string, options: { raw?: boolean }) => {
      const id = parseModelId(rawId);

      await withStore("cli.get", async (store) => {
        const model = store.model(modelName);
        const instance = await model.get(id);
        if (instance === null) {
          throw new NotFoundError(model.name, `id ${id}`);
        }
        printJson(io, summarize(instance), { raw: options.raw });
      });
    });

  // Find command
  program
    .command("find <model> <property> <value>")
    .description("Retrieve the object holding a unique value")
    .option("--json-value", "Parse <value> as JSON (numbers, booleans, null)")
    .option("--raw", "Output raw JSON without formatting")
    .action(
      async (modelName: string, property: string, rawValue: string, options: { jsonValue?: boolean; raw?: boolean }) => {
        const value = parseLookupValue(rawValue, options.jsonValue === true);

        await withStore("cli.find", async (store) => {
          const model = store.model(modelName);
          const instance = await model.findBy(property, value);
          if (instance === null) {
            throw new NotFoundError(model.name, `${property} ${JSON.stringify(value)}`);
          }
          printJson(io, summarize(instance), { raw: options.raw });
        });
      }
    );

  // Id command
  program
    .command("id <model> <property> <value>")
    .description("Print the id of the object holding a unique value")
    .option("--json-value", "Parse <value> as JSON (numbers, booleans, null)")
    .action(async (modelName: string, property: string, rawValue: string, options: { jsonValue?: boolean }) => {
      const value = parseLookupValue(rawValue, options.jsonValue === true);

      await withStore("cli.id", async (store) => {
        const model = store.model(modelName);
        const id = await model.idFor(property, value);
        if (id === null) {
          throw new NotFoundError(model.name, `${property} ${JSON.stringify(value)}`);
        }
        printLines(io, [String(id)]);
      });
    });

  // Remove command
  program
    .command("rm <model> <id>")
    .description("Remove an object and release its unique values")
    .option("--force", "Force removal without confirmation")
    .action(async (modelName: string, rawId: string, options: { force?: boolean }) => {
      const id = parseModelId(rawId);

      // Require confirmation unless --force
      if (!options.force) {
        if (!io.isStdinTTY()) {
          throw new CliError("Use --force to confirm removal in non-interactive mode");
        }
        if (!(await io.confirm(`Remove ${modelName} ${id}?`))) {
          throw new CliError("Aborted by user");
        }
      }

      await withStore("cli.rm", async (store, opts) => {
        const result = await store.model(modelName).deleteById(id);
        if (!result.ok) {
          throw result.error;
        }

        if (!opts.quiet) {
          const released = result.released.length > 0 ? ` (released ${result.released.join(", ")})` : "";
          printLines(io, [`Removed ${modelName} ${id}${released}`]);
        }
      });
    });

  return program;
}

/**
 * Parse and run one command line
 * @param argv - Arguments after the executable and script names
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIO = processIO): Promise<number> {
  const program = createProgram(io);

  try {
    await program.parseAsync(argv, { from: "user" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError && reported.has(err)) {
      return err.exitCode;
    }

    const verbose = program.opts<GlobalOptions>().verbose === true || isVerbose();
    io.stderr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.color) + "\n");
    return mapSdkErrorToExitCode(err);
  }
}

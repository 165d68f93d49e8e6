import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import {
  DEFAULT_RUNNER_CONFIG,
  RunStateSchema,
  RunnerConfigSchema,
} from "../types/index.js";
import type {
  RunState,
  RunnerConfig,
  StackGraph,
  StackWarning,
} from "../types/index.js";
import {
  StackFileNotFoundError,
  StackValidationError,
  StackWriteError,
} from "../errors/index.js";
import { assertValidStack } from "./SchemaValidatorService.js";
import { FileEventLog } from "./EventLogService.js";
import { ModuleImplementationResolver } from "./ImplementationResolver.js";

/** Directory beside the stack file that holds runner artifacts. */
const STATE_DIR = ".agent-stack";

/** Name of the runner configuration file. */
const CONFIG_FILENAME = "config.json";

/** Name of the persisted run state. */
const RUN_STATE_FILENAME = "run_state.json";

// ── Helpers ────────────────────────────────────────────────────────

/** Return true when an `fs` error has code === `code`. */
export function isFsError(err: unknown, code: string): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === code
  );
}

/**
 * Read a text file, throwing `StackFileNotFoundError` when absent.
 */
async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isFsError(err, "ENOENT")) {
      throw new StackFileNotFoundError(filePath);
    }
    throw err;
  }
}

/**
 * Parse JSON content, mapping syntax errors to a `parse` issue.
 */
function parseJson(filePath: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new StackValidationError(filePath, [
      {
        code: "parse",
        message: err instanceof Error ? err.message : String(err),
        agents: [],
      },
    ]);
  }
}

/**
 * Atomic write: data → tmp → rename.
 * Ensures the parent directory exists before writing.
 */
async function atomicWrite(
  targetPath: string,
  data: string,
): Promise<void> {
  const tmpPath = targetPath + ".tmp";
  try {
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    await fs.writeFile(tmpPath, data, "utf-8");
    await fs.rename(tmpPath, targetPath);
  } catch (err) {
    // Best-effort cleanup of the tmp file on failure
    await fs.unlink(tmpPath).catch(() => {});
    throw new StackWriteError(targetPath, err);
  }
}

/**
 * StackFileSystem
 *
 * Encapsulates all file-system access for one stack file: the
 * declaration itself plus the runner artifacts kept in `.agent-stack/`
 * beside it.
 *
 * Design invariants:
 *   - Reads are always validated before returning.
 *   - Writes use the atomic temp-and-rename pattern to prevent partial writes.
 *   - Relative paths inside the stack file resolve against its directory.
 */
export class StackFileSystem {
  /** Absolute path of the stack file. */
  public readonly stackFilePath: string;

  /** Directory containing the stack file. */
  public readonly baseDir: string;

  /** Resolved path to the .agent-stack directory. */
  public readonly stateDir: string;

  private constructor(stackFilePath: string) {
    this.stackFilePath = stackFilePath;
    this.baseDir = path.dirname(stackFilePath);
    this.stateDir = path.join(this.baseDir, STATE_DIR);
  }

  // ── Factory ──────────────────────────────────────────────────────

  /**
   * Open a stack file, resolved against `cwd`.
   *
   * @throws StackFileNotFoundError — no such file
   */
  static async open(
    stackFile: string,
    cwd: string = process.cwd(),
  ): Promise<StackFileSystem> {
    const resolved = path.resolve(cwd, stackFile);
    try {
      const stat = await fs.stat(resolved);
      if (!stat.isFile()) throw new StackFileNotFoundError(resolved);
    } catch (err) {
      if (isFsError(err, "ENOENT")) throw new StackFileNotFoundError(resolved);
      throw err;
    }
    return new StackFileSystem(resolved);
  }

  // ── Stack declaration ────────────────────────────────────────────

  /**
   * Read and parse the stack file. YAML is a superset of JSON, so both
   * formats are accepted.
   *
   * @throws StackFileNotFoundError — file absent
   * @throws StackValidationError   — file is not valid YAML
   */
  async readStackDocument(): Promise<unknown> {
    const raw = await readTextFile(this.stackFilePath);
    try {
      return parseYaml(raw);
    } catch (err) {
      throw new StackValidationError(this.stackFilePath, [
        {
          code: "parse",
          message: err instanceof Error ? err.message : String(err),
          agents: [],
        },
      ]);
    }
  }

  /**
   * Read, validate and build the stack graph.
   *
   * @throws StackValidationError — declaration invalid
   * @throws PolicyConflictError  — required policies cannot be honoured
   */
  async loadStackGraph(): Promise<{ graph: StackGraph; warnings: StackWarning[] }> {
    const document = await this.readStackDocument();
    return assertValidStack(document, this.stackFilePath);
  }

  // ── Runner config ────────────────────────────────────────────────

  /** Resolved path to config.json. */
  get configPath(): string {
    return path.join(this.stateDir, CONFIG_FILENAME);
  }

  /**
   * Read and validate .agent-stack/config.json.
   *
   * If the file is absent, returns `DEFAULT_RUNNER_CONFIG` without
   * throwing — absence is expected.
   *
   * @throws StackValidationError — JSON present but fails Zod
   */
  async readRunnerConfig(): Promise<RunnerConfig> {
    let raw: string;
    try {
      raw = await readTextFile(this.configPath);
    } catch (err) {
      if (err instanceof StackFileNotFoundError) {
        return DEFAULT_RUNNER_CONFIG;
      }
      throw err;
    }

    const result = RunnerConfigSchema.safeParse(parseJson(this.configPath, raw));
    if (!result.success) {
      throw StackValidationError.fromZodError(this.configPath, result.error);
    }
    return result.data;
  }

  // ── Run state (read / write) ─────────────────────────────────────

  /** Resolved path to run_state.json. */
  get runStatePath(): string {
    return path.join(this.stateDir, RUN_STATE_FILENAME);
  }

  /**
   * Read and validate the persisted run state.
   * Returns null when no run has been recorded yet.
   *
   * @throws StackValidationError — JSON present but fails Zod
   */
  async readRunState(): Promise<RunState | null> {
    let raw: string;
    try {
      raw = await readTextFile(this.runStatePath);
    } catch (err) {
      if (err instanceof StackFileNotFoundError) return null;
      throw err;
    }

    const result = RunStateSchema.safeParse(parseJson(this.runStatePath, raw));
    if (!result.success) {
      throw StackValidationError.fromZodError(this.runStatePath, result.error);
    }
    return result.data;
  }

  /**
   * Atomically write the run state.
   *
   * @throws StackValidationError — payload fails pre-write Zod check
   * @throws StackWriteError      — I/O failure
   */
  async writeRunState(state: RunState): Promise<void> {
    const result = RunStateSchema.safeParse(state);
    if (!result.success) {
      throw StackValidationError.fromZodError(this.runStatePath, result.error);
    }

    const serialized = JSON.stringify(result.data, null, 2) + "\n";
    await atomicWrite(this.runStatePath, serialized);
  }

  // ── Collaborators rooted at this stack ───────────────────────────

  /** Resolved path of the event log named by `config.event_log`. */
  eventLogPath(config: RunnerConfig): string {
    return path.resolve(this.stateDir, config.event_log);
  }

  createEventLog(config: RunnerConfig): FileEventLog {
    return new FileEventLog(this.eventLogPath(config));
  }

  createImplementationResolver(): ModuleImplementationResolver {
    return new ModuleImplementationResolver(this.baseDir);
  }
}

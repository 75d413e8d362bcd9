/**
 * Runs model-written JavaScript against the code-mode registry.
 *
 * Each snippet is compiled as the body of an async function inside one
 * `node:vm` context per run, so `await` works anywhere and the snippet
 * surfaces a value with `return`. The context only sees:
 *   - callMcpTool(server, tool, args)  the bridge
 *   - require(path)                    generated modules inside the registry
 *   - listDir(path) / readFile(path)   read-only, confined to the registry
 *   - console                          captured into the tool result
 *
 * Each snippet gets its own console bound to its own output buffer. Writes
 * that arrive after the snippet settled or timed out are dropped.
 *
 * `node:vm` is not a security boundary. Synchronous work is bounded by the
 * vm timeout and the whole snippet by an overall timeout, but a snippet that
 * blocks after its first await cannot be preempted.
 */
import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { dirname, extname, isAbsolute, join, relative, resolve, sep } from "node:path";
import { format } from "node:util";
import vm from "node:vm";
import type { Logger } from "../utils/logger.js";
import { truncateText } from "../utils/text.js";

export type ToolCaller = (
  serverName: string,
  toolName: string,
  args: Record<string, unknown>
) => Promise<unknown>;

export interface CodeRuntimeOptions {
  registryRoot: string;
  callTool: ToolCaller;
  timeoutMs?: number;
  maxOutputChars?: number;
  logger?: Logger;
}

export const NO_OUTPUT_MESSAGE = "Code executed successfully (no output).";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_OUTPUT_CHARS = 20_000;

/** Context slot that hands a snippet its console while it starts. */
const SNIPPET_CONSOLE = "__snippetConsole";

interface LoadedModule {
  exports: unknown;
}

interface Execution {
  id: number;
  output: string[];
  settled: boolean;
}

type ConsoleWriter = (...args: unknown[]) => void;

export class CodeRuntime {
  private readonly root: string;
  private readonly callTool: ToolCaller;
  private readonly timeoutMs: number;
  private readonly maxOutputChars: number;
  private readonly logger?: Logger;
  private readonly context: vm.Context;
  private readonly moduleCache = new Map<string, LoadedModule>();
  private active?: Execution;
  private executions = 0;

  constructor(options: CodeRuntimeOptions) {
    this.root = resolve(options.registryRoot);
    this.callTool = options.callTool;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
    this.logger = options.logger;
    this.context = vm.createContext(this.createGlobals(), {
      name: "code-mode",
      codeGeneration: { strings: false, wasm: false },
    });
  }

  /**
   * Execute one snippet. Never throws: failures come back as
   * "Execution Error: <name>: <message>" after any output already printed.
   */
  async execute(code: string): Promise<string> {
    const execution: Execution = { id: ++this.executions, output: [], settled: false };
    const filename = `snippet-${execution.id}.js`;
    this.active = execution;

    try {
      const script = new vm.Script(
        `((console) => (async () => {\n${code}\n})())(${SNIPPET_CONSOLE})`,
        { filename, lineOffset: -1 }
      );
      this.context[SNIPPET_CONSOLE] = this.createConsole(() => execution);
      let pending: unknown;
      try {
        pending = script.runInContext(this.context, { timeout: this.timeoutMs });
      } finally {
        delete this.context[SNIPPET_CONSOLE];
      }
      const value = await this.withTimeout(Promise.resolve(pending));
      if (value !== undefined) {
        execution.output.push(formatValue(value));
      }
      return this.collectOutput(execution) || NO_OUTPUT_MESSAGE;
    } catch (err) {
      const message = `Execution Error: ${describeError(err)}`;
      this.logger?.info({ snippet: filename, error: message }, "Code execution failed");
      const printed = this.collectOutput(execution);
      return printed ? `${printed}\n${message}` : message;
    } finally {
      execution.settled = true;
      if (this.active === execution) {
        this.active = undefined;
      }
    }
  }

  /** Console writing to whichever execution `target` names, if still running. */
  private createConsole(target: () => Execution | undefined): Record<string, ConsoleWriter> {
    const write: ConsoleWriter = (...args) => {
      const execution = target();
      if (!execution || execution.settled) {
        this.logger?.debug(
          { snippet: execution ? `snippet-${execution.id}.js` : undefined },
          "Dropped console output from a finished snippet"
        );
        return;
      }
      execution.output.push(format(...args));
    };
    return { log: write, info: write, debug: write, warn: write, error: write };
  }

  private createGlobals(): Record<string, unknown> {
    return {
      // Used by registry modules; snippets see their own console
      console: this.createConsole(() => this.active),
      callMcpTool: (serverName: unknown, toolName: unknown, args: unknown) => {
        if (typeof serverName !== "string" || typeof toolName !== "string") {
          throw new TypeError("callMcpTool(server, tool, args) expects string server and tool names");
        }
        return this.callTool(serverName, toolName, isRecord(args) ? args : {});
      },
      require: (specifier: unknown) => this.require(specifier, this.root),
      listDir: (path: unknown = ".") => this.listDir(path),
      readFile: (path: unknown) => this.readFile(path),
    };
  }

  private listDir(path: unknown): string[] {
    const target = this.resolvePath(path, this.root);
    return readdirSync(target, { withFileTypes: true })
      .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
      .sort();
  }

  private readFile(path: unknown): string {
    const target = this.resolvePath(path, this.root);
    if (!statSync(target).isFile()) {
      throw new Error(`Not a file: ${String(path)}`);
    }
    return readFileSync(target, "utf-8");
  }

  private require(specifier: unknown, fromDir: string): unknown {
    const target = this.resolveModule(this.resolvePath(specifier, fromDir));
    const cached = this.moduleCache.get(target);
    if (cached) return cached.exports;

    const source = readFileSync(target, "utf-8");
    const loaded: LoadedModule = { exports: {} };

    if (extname(target) === ".json") {
      loaded.exports = JSON.parse(source);
      this.moduleCache.set(target, loaded);
      return loaded.exports;
    }

    // Cached before evaluation so circular requires see partial exports
    this.moduleCache.set(target, loaded);
    const moduleFn = vm.compileFunction(source, ["module", "exports", "require"], {
      filename: target,
      parsingContext: this.context,
    });
    const localRequire = (next: unknown) => this.require(next, dirname(target));
    try {
      moduleFn(loaded, loaded.exports, localRequire);
    } catch (err) {
      this.moduleCache.delete(target);
      throw err;
    }
    return loaded.exports;
  }

  /** Directory → index.js, extensionless → .js, else as given. */
  private resolveModule(path: string): string {
    if (existsSync(path) && statSync(path).isDirectory()) {
      return this.ensureInside(join(path, "index.js"), path);
    }
    if (!existsSync(path) && existsSync(`${path}.js`)) {
      return `${path}.js`;
    }
    const ext = extname(path);
    if (ext !== ".js" && ext !== ".json") {
      throw new Error(`Only .js and .json registry modules can be required: ${path}`);
    }
    if (!existsSync(path)) {
      throw new Error(`Cannot find module '${this.display(path)}'`);
    }
    return path;
  }

  private resolvePath(path: unknown, baseDir: string): string {
    if (typeof path !== "string" || path.trim() === "") {
      throw new TypeError("Expected a non-empty path string");
    }
    const base = path.startsWith("./") || path.startsWith("../") ? baseDir : this.root;
    return this.ensureInside(resolve(base, path), path);
  }

  private ensureInside(target: string, requested: string): string {
    const rel = relative(this.root, target);
    if (rel === "" || (!rel.startsWith(`..${sep}`) && rel !== ".." && !isAbsolute(rel))) {
      return target;
    }
    throw new Error(`Path escapes the tool registry: ${requested}`);
  }

  private display(path: string): string {
    return relative(this.root, path) || ".";
  }

  private collectOutput(execution: Execution): string {
    const joined = execution.output.join("\n");
    const { content, truncated } = truncateText(joined, this.maxOutputChars);
    return truncated ? `${content}\n[output truncated]` : content;
  }

  private async withTimeout<T>(promise: Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    try {
      return await Promise.race([
        promise,
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Code execution timed out after ${this.timeoutMs}ms`)),
            this.timeoutMs
          );
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Render a returned value the way the model will read it. */
export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    const json = JSON.stringify(value, null, 2);
    if (json !== undefined) return json;
  } catch {
    // circular or BigInt; fall back to util.format below
  }
  return format("%o", value);
}

/** Errors thrown inside the vm context are not host `Error` instances. */
function describeError(err: unknown): string {
  if (typeof err === "object" && err !== null) {
    const name = "name" in err && typeof err.name === "string" ? err.name : "Error";
    const message = "message" in err && typeof err.message === "string" ? err.message : String(err);
    return `${name}: ${message}`;
  }
  return `Error: ${String(err)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

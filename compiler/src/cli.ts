import { readFile, writeFile } from "node:fs/promises";
import { parseCircuitDocument } from "./circuit/document.ts";
import type { Circuit } from "./circuit/types.ts";
import { type Diagnostic, toDiagnostics } from "./errors/index.ts";
import { Exporter } from "./exporter/exporter.ts";
import type { ExportOptions } from "./exporter/options.ts";

const VERSION = "0.1.0";

const KNOWN_FLAGS = new Set([
  "--no-fold",
  "--include",
  "--output",
  "--ast-json",
  "--help",
  "--version",
]);

/** Flags that consume the following argument. */
const VALUE_FLAGS = new Set(["--include", "--output", "-o"]);

// ─── Argument parsing ────────────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  printHelp();
  process.exit(0);
}

if (args.includes("--version") || args.includes("-V")) {
  console.log(`qasm3-export ${VERSION}`);
  process.exit(0);
}

const flags = new Set<string>();
const includes: string[] = [];
const positional: string[] = [];
let outputPath: string | null = null;

for (let i = 0; i < args.length; i++) {
  const arg = args[i] ?? "";
  if (!arg.startsWith("-")) {
    positional.push(arg);
    continue;
  }
  if (!KNOWN_FLAGS.has(arg) && arg !== "-o") {
    console.error(`error: unknown flag '${arg}'`);
    console.error("Run with --help to see available options.\n");
    process.exit(1);
  }
  if (VALUE_FLAGS.has(arg)) {
    const value = args[++i];
    if (value === undefined || value.startsWith("-")) {
      console.error(`error: '${arg}' expects a value`);
      process.exit(1);
    }
    if (arg === "--include") includes.push(value);
    else outputPath = value;
    continue;
  }
  flags.add(arg);
}

const filePath = positional[0];

if (!filePath) {
  console.error("error: no input file provided\n");
  printHelp();
  process.exit(1);
}

if (positional.length > 1) {
  console.error(`error: expected one input file, got ${positional.length}`);
  process.exit(1);
}

const options: ExportOptions = {
  foldConstants: !flags.has("--no-fold"),
  ...(includes.length > 0 ? { includes } : {}),
};

// ─── Formatting helpers ──────────────────────────────────────────────────────

/** `file:path: severity: message`, dropping whichever location part is empty. */
function formatDiagnostic(diag: Diagnostic): string {
  const where = [diag.location.file, diag.location.path].filter((part) => part.length > 0).join(":");
  return `${where || "<input>"}: ${diag.severity}: ${diag.message}`;
}

/** Print all diagnostics. Returns the error count. */
function reportDiagnostics(diagnostics: readonly Diagnostic[]): number {
  let errorCount = 0;
  for (const diag of diagnostics) {
    console.error(formatDiagnostic(diag));
    if (diag.severity === "error") errorCount++;
  }
  return errorCount;
}

function fail(error: unknown): never {
  const n = reportDiagnostics(toDiagnostics(error, filePath));
  console.error(`\n${n} error${n !== 1 ? "s" : ""} emitted`);
  process.exit(1);
}

function printHelp(): void {
  console.log(`qasm3-export ${VERSION}: OpenQASM 3 exporter for circuit documents

Usage: qasm3-export <circuit.json> [options]

Options:
  --include <file>     Emit 'include <file>;' and load its standard gates
                       (repeatable, default: stdgates.inc)
  --no-fold            Print numeric parameters as decimals, never as multiples of pi
  --output, -o <file>  Write the program to <file> instead of stdout
  --ast-json           Print the OpenQASM 3 AST as JSON
  --help, -h           Show this help message
  --version, -V        Show the exporter version

Examples:
  qasm3-export bell.json                   Print bell.json as OpenQASM 3
  qasm3-export bell.json -o bell.qasm      Write the program to bell.qasm
  qasm3-export bell.json --no-fold         Keep angles as decimal literals`);
}

// ─── Pipeline ────────────────────────────────────────────────────────────────

let content: string;
try {
  content = await readFile(filePath, "utf8");
} catch {
  console.error(`error: could not read file '${filePath}'`);
  process.exit(1);
}

let circuit: Circuit;
try {
  circuit = parseCircuitDocument(content);
} catch (error) {
  fail(error);
}

const exporter = new Exporter(options);

try {
  if (flags.has("--ast-json")) {
    console.log(JSON.stringify(exporter.buildProgram(circuit), null, 2));
  } else if (outputPath !== null) {
    await writeFile(outputPath, exporter.dumps(circuit), "utf8");
  } else {
    exporter.dump(circuit, process.stdout);
  }
} catch (error) {
  fail(error);
}

#!/usr/bin/env node
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import type { CategoryFolder } from "./catalog/categoryTree.js";
import { loadCatalogConfig, type OutputFormat } from "./config/catalog.js";
import type { EnvSource } from "./config/env.js";
import { CatalogInputError } from "./errors.js";
import type { DependencyStats } from "./graph/analysis.js";
import { StructuredLogger } from "./logger.js";
import { QUERY_OPERATORS, type LogicalOperator, type QueryOperator } from "./query/condition.js";
import { FieldAccessor, type QueryableField } from "./query/fieldAccessor.js";
import { parseQueryDefinition } from "./query/schemas.js";
import { loadCatalogDocument } from "./records/document.js";
import { InMemoryRecordSource } from "./records/memorySource.js";
import type { CatalogRecord } from "./records/types.js";
import type { Primitive } from "./records/values.js";
import { CatalogWorkspace } from "./workspace.js";

export interface WhereClause {
  readonly field: string;
  readonly operator: QueryOperator;
  readonly value: Primitive;
}

export type CliCommand =
  | { readonly name: "query"; readonly where: readonly WhereClause[]; readonly logic: LogicalOperator }
  | { readonly name: "orphans"; readonly exclude: readonly string[] }
  | { readonly name: "popular"; readonly top?: number }
  | { readonly name: "path"; readonly from: string; readonly to: string }
  | { readonly name: "stats"; readonly id?: string }
  | { readonly name: "fields"; readonly typeName: string }
  | { readonly name: "tree" };

interface CliOptions {
  readonly file: string;
  readonly format: OutputFormat;
  readonly command: CliCommand;
}

/** Output channels of a CLI run; both receive complete lines without the newline. */
export interface CliIo {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  readonly env?: EnvSource;
  readonly clock?: () => number;
}

const OPERATOR_ALIASES: Readonly<Partial<Record<string, QueryOperator>>> = {
  "==": "eq",
  "=": "eq",
  "!=": "neq",
  ">": "gt",
  ">=": "gte",
  "<": "lt",
  "<=": "lte",
  "~": "regex",
};

const USAGE = [
  "Usage: catalog-lens <catalog.json> <command> [options] [--format text|json]",
  "",
  "Commands:",
  '  query --where "<field> <op> [value]"... [--any]',
  "  orphans [--exclude Type,...]",
  "  popular [--top N]",
  "  path <fromId> <toId>",
  "  stats [<id>]",
  "  fields <Type>",
  "  tree",
];

function isQueryOperator(value: string): value is QueryOperator {
  return QUERY_OPERATORS.some((operator) => operator === value);
}

/** Reads a typed-in literal: `null`, booleans, numbers, JSON strings, else the raw text. */
function parseLiteral(text: string): Primitive {
  const trimmed = text.trim();
  if (trimmed === "null") {
    return null;
  }
  if (trimmed === "true" || trimmed === "false") {
    return trimmed === "true";
  }
  if (trimmed.length > 0 && Number.isFinite(Number(trimmed))) {
    return Number(trimmed);
  }
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    const decoded: unknown = JSON.parse(trimmed);
    if (typeof decoded === "string") {
      return decoded;
    }
  }
  return trimmed;
}

/** Parses `<field> <op> [value]`, e.g. `hp > 50` or `name contains "gob"`. */
function parseWhereClause(text: string): WhereClause {
  const match = /^\s*(\S+)\s+(\S+)(?:\s+(.*))?$/.exec(text);
  if (!match) {
    throw new CatalogInputError(`--where expects "<field> <op> [value]", got '${text}'`);
  }
  const [, field, rawOperator, rawValue] = match;
  const operator = OPERATOR_ALIASES[rawOperator] ?? (isQueryOperator(rawOperator) ? rawOperator : null);
  if (!operator) {
    throw new CatalogInputError(`unknown operator '${rawOperator}'`);
  }
  const unary = operator === "isNull" || operator === "isNotNull";
  if (unary && rawValue !== undefined) {
    throw new CatalogInputError(`operator '${operator}' takes no value`);
  }
  if (!unary && rawValue === undefined) {
    throw new CatalogInputError(`operator '${operator}' expects a value`);
  }
  return { field, operator, value: rawValue === undefined ? null : parseLiteral(rawValue) };
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
    throw new CatalogInputError(`${flag} expects a positive integer`);
  }
  return parsed;
}

function parseArgs(argv: readonly string[], defaultFormat: OutputFormat): CliOptions {
  const [file, commandName, ...rest] = argv;
  if (!file || file.startsWith("--")) {
    throw new CatalogInputError("first positional argument must be the path to a catalog document");
  }
  if (!commandName) {
    throw new CatalogInputError("missing command");
  }

  let format = defaultFormat;
  const positionals: string[] = [];
  const where: WhereClause[] = [];
  let logic: LogicalOperator = "and";
  let exclude: string[] = [];
  let top: number | undefined;

  for (let i = 0; i < rest.length; i++) {
    const token = rest[i];
    switch (token) {
      case "--format": {
        const value = rest[++i];
        if (value !== "json" && value !== "text") {
          throw new CatalogInputError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--where": {
        const clause = rest[++i];
        if (clause === undefined) {
          throw new CatalogInputError("--where expects a clause");
        }
        where.push(parseWhereClause(clause));
        break;
      }
      case "--any":
        logic = "or";
        break;
      case "--exclude": {
        const value = rest[++i];
        if (value === undefined) {
          throw new CatalogInputError("--exclude expects a comma-separated list of types");
        }
        exclude = value
          .split(",")
          .map((entry) => entry.trim())
          .filter((entry) => entry.length > 0);
        break;
      }
      case "--top":
        top = parsePositiveInt("--top", rest[++i]);
        break;
      default:
        if (token.startsWith("--")) {
          throw new CatalogInputError(`unknown argument '${token}'`);
        }
        positionals.push(token);
    }
  }

  return { file, format, command: buildCommand(commandName, positionals, { where, logic, exclude, top }) };
}

function buildCommand(
  name: string,
  positionals: readonly string[],
  flags: { where: WhereClause[]; logic: LogicalOperator; exclude: string[]; top: number | undefined },
): CliCommand {
  const expectPositionals = (count: number, usage: string): void => {
    if (positionals.length !== count) {
      throw new CatalogInputError(`usage: ${usage}`);
    }
  };
  switch (name) {
    case "query":
      expectPositionals(0, 'query --where "<field> <op> [value]"... [--any]');
      return { name, where: flags.where, logic: flags.logic };
    case "orphans":
      expectPositionals(0, "orphans [--exclude Type,...]");
      return { name, exclude: flags.exclude };
    case "popular":
      expectPositionals(0, "popular [--top N]");
      return flags.top === undefined ? { name } : { name, top: flags.top };
    case "path":
      expectPositionals(2, "path <fromId> <toId>");
      return { name, from: positionals[0], to: positionals[1] };
    case "stats":
      if (positionals.length > 1) {
        throw new CatalogInputError("usage: stats [<id>]");
      }
      return positionals.length === 1 ? { name, id: positionals[0] } : { name };
    case "fields":
      expectPositionals(1, "fields <Type>");
      return { name, typeName: positionals[0] };
    case "tree":
      expectPositionals(0, "tree");
      return { name };
    default:
      throw new CatalogInputError(`unknown command '${name}'`);
  }
}

interface RecordSummary {
  readonly id: string;
  readonly name: string;
  readonly type: string;
}

function summarise(record: CatalogRecord): RecordSummary {
  return { id: record.id, name: record.name, type: record.type.name };
}

function formatRecord(record: CatalogRecord): string {
  return `${record.name} [${record.type.name}] ${record.id}`;
}

function formatRanking(entries: readonly DependencyStats[]): string[] {
  return entries.map(
    (entry, index) => `${index + 1}. ${formatRecord(entry.record)}: referenced by ${entry.referenceCount}`,
  );
}

function formatFields(fields: readonly QueryableField[], typeName: string): string[] {
  return fields.map((field) =>
    field.owner.name === typeName ? `${field.name}: ${field.typeName}` : `${field.name}: ${field.typeName} (from ${field.owner.name})`,
  );
}

function formatTree(folders: readonly CategoryFolder[]): string[] {
  const lines: string[] = [];
  for (const folder of folders) {
    lines.push(`${folder.displayName} (${folder.recordCount})`);
    for (const child of folder.children) {
      lines.push(`  ${child.displayName} (${child.recordCount})`);
    }
  }
  return lines;
}

/** Executes one command and returns the lines or JSON payload to print. */
function execute(workspace: CatalogWorkspace, command: CliCommand, accessor: FieldAccessor): { text: string[]; json: unknown } {
  switch (command.name) {
    case "query": {
      const group = parseQueryDefinition({ logic: command.logic, conditions: command.where }, accessor);
      const matches = workspace.query(group);
      return {
        text: [...matches.map(formatRecord), `${matches.length} match(es) for ${group.describe()}`],
        json: { query: group.describe(), matches: matches.map(summarise) },
      };
    }
    case "orphans": {
      const orphans = workspace.analysis.findOrphans(command.exclude);
      return {
        text: [...orphans.map(formatRecord), `${orphans.length} orphan(s)`],
        json: { orphans: orphans.map(summarise) },
      };
    }
    case "popular": {
      const ranking = workspace.analysis.mostReferenced(command.top);
      return {
        text: formatRanking(ranking),
        json: {
          mostReferenced: ranking.map((entry) => ({
            ...summarise(entry.record),
            referenceCount: entry.referenceCount,
            dependencyCount: entry.dependencyCount,
          })),
        },
      };
    }
    case "path": {
      const path = workspace.analysis.shortestPath(command.from, command.to);
      return {
        text: [path ? path.map((record) => record.id).join(" -> ") : `no path from ${command.from} to ${command.to}`],
        json: { from: command.from, to: command.to, path: path ? path.map((record) => record.id) : null },
      };
    }
    case "stats": {
      if (command.id === undefined) {
        const stats = workspace.analysis.graphStats();
        return {
          text: [
            `records: ${stats.nodeCount}`,
            `references: ${stats.edgeCount}`,
            `orphans: ${stats.orphanCount} (${stats.orphanPercentage.toFixed(1)}%)`,
            `average dependencies: ${stats.averageDependencies.toFixed(2)}`,
          ],
          json: stats,
        };
      }
      const record = workspace.snapshot().allRecords().find((candidate) => candidate.id === command.id);
      if (!record) {
        throw new CatalogInputError(`unknown record '${command.id}'`);
      }
      const stats = workspace.analysis.statsFor(record);
      return {
        text: [
          formatRecord(record),
          `referenced by: ${stats.referenceCount}`,
          `depends on: ${stats.dependencyCount}`,
          `orphan: ${stats.isOrphan ? "yes" : "no"}`,
        ],
        json: {
          ...summarise(record),
          referenceCount: stats.referenceCount,
          dependencyCount: stats.dependencyCount,
          isOrphan: stats.isOrphan,
        },
      };
    }
    case "fields": {
      const fields = workspace.queryableFields(command.typeName);
      if (!fields) {
        throw new CatalogInputError(`unknown type '${command.typeName}'`);
      }
      return {
        text: formatFields(fields, command.typeName),
        json: {
          type: command.typeName,
          fields: fields.map((field) => ({
            name: field.name,
            kind: field.kind,
            typeName: field.typeName,
            owner: field.owner.name,
          })),
        },
      };
    }
    case "tree": {
      const folders = workspace.snapshot().categories;
      return {
        text: formatTree(folders),
        json: folders.map((folder) => ({
          category: folder.displayName,
          recordCount: folder.recordCount,
          types: folder.children.map((child) => ({
            name: child.type.name,
            displayName: child.displayName,
            recordCount: child.recordCount,
          })),
        })),
      };
    }
  }
}

/**
 * Runs the CLI against {@link argv} (without the node and script entries).
 * Resolves with the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  if (argv.length === 0) {
    USAGE.forEach((line) => io.stderr(line));
    return 1;
  }
  const config = loadCatalogConfig(io.env ?? process.env);
  const logger = new StructuredLogger({
    stream: { write: (chunk: string) => io.stderr(chunk.trimEnd()) },
    logFile: config.logFile,
    redactionEnabled: config.logRedaction,
  });
  try {
    const options = parseArgs(argv, config.outputFormat);
    const document = await loadCatalogDocument(options.file);
    const accessor = new FieldAccessor({ reservedFields: config.reservedFields });
    const workspace = new CatalogWorkspace({
      source: new InMemoryRecordSource(document.records),
      accessor,
      types: document.types,
      ttlMs: config.graphCacheTtlMs,
      topLimit: config.topLimit,
      logger,
      ...(io.clock ? { clock: io.clock } : {}),
    });
    const output = execute(workspace, options.command, accessor);
    if (options.format === "json") {
      io.stdout(JSON.stringify(output.json, null, 2));
    } else {
      output.text.forEach((line) => io.stdout(line));
    }
    return 0;
  } catch (error) {
    io.stderr(`error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    await logger.flush();
  }
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  return thisModulePath === executedFromCli;
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2), {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/** Internal helpers exposed to the test suite; not part of the public API. */
export const __testing = {
  parseArgs,
  parseWhereClause,
  parseLiteral,
};

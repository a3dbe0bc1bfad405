#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import { scan, type ScanResult } from "./scanner.js";
import { formatDiagnostics } from "./errors/reporter.js";
import { payloadOf, type Token } from "./lexer/tokens.js";
import { renderTokens } from "./lexer/render.js";

const SOURCE_EXTENSION = ".cfl";

async function resolveDefaultFile(file: string | undefined): Promise<string> {
  if (file) return file;
  const entries = await readdir(process.cwd());
  const found = entries.filter(f => f.endsWith(SOURCE_EXTENSION));
  if (found.length === 0) {
    throw new Error(`No ${SOURCE_EXTENSION} file found in the current directory. Pass a file path explicitly.`);
  }
  if (found.length > 1) {
    throw new Error(`Multiple ${SOURCE_EXTENSION} files found: ${found.join(", ")}. Pass a file path explicitly.`);
  }
  return path.join(process.cwd(), found[0]);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

async function scanSource(file: string | undefined, includeEof: boolean): Promise<ScanResult> {
  const resolved = await resolveDefaultFile(file);
  const bytes = await readFile(resolved);
  const result = scan(bytes, resolved, { includeEof });
  if (result.errors.length > 0) {
    console.error(formatDiagnostics(bytes.toString("utf-8"), result.errors));
    process.exit(1);
  }
  return result;
}

function formatTokenLine(token: Token): string {
  const payload = payloadOf(token);
  const shown = payload === undefined ? "" : JSON.stringify(payload, jsonReplacer);
  return `${token.kind}\t${shown}\t${token.span.start.line}:${token.span.start.column}`;
}

function fail(e: unknown): never {
  console.error(`${chalk.red("Error")}: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
}

const program = new Command()
  .name("conflex")
  .description("Tokenizer for the conflex configuration language")
  .version("0.3.0");

program
  .command("tokens [file]")
  .description(`Print the token stream of a ${SOURCE_EXTENSION} file (defaults to the single ${SOURCE_EXTENSION} file in the current directory)`)
  .option("--json", "Print tokens as a JSON array")
  .option("--no-eof", "Omit the trailing EOF token")
  .action(async (file: string | undefined, opts: { json?: boolean; eof: boolean }) => {
    try {
      const result = await scanSource(file, opts.eof);

      if (opts.json) {
        console.log(JSON.stringify(result.tokens, jsonReplacer, 2));
        return;
      }
      for (const token of result.tokens) {
        console.log(formatTokenLine(token));
      }
    } catch (e) {
      fail(e);
    }
  });

program
  .command("render [file]")
  .description("Print the canonical spelling of every token")
  .action(async (file: string | undefined) => {
    try {
      const result = await scanSource(file, false);
      console.log(renderTokens(result.tokens));
    } catch (e) {
      fail(e);
    }
  });

program
  .command("check [file]")
  .description("Report the first lexical error, if any")
  .action(async (file: string | undefined) => {
    try {
      const result = await scanSource(file, true);
      console.log(`${chalk.green("ok")} (${result.tokens.length} tokens)`);
    } catch (e) {
      fail(e);
    }
  });

await program.parseAsync();

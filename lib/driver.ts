import fs from 'fs';
import path from 'path';
import type { ConverterConfig } from './config';
import { ConfigError, ConversionError } from './errors';
import { buildArgs, outputDirFor, runCommand, type CommandRunner, type TargetFormat } from './nbconvert';
import { publishTree } from './publish';

export interface Output {
  write(text: string): unknown;
}

export type DocumentResult =
  | { document: string; ok: true; script: string; markdown: string }
  | { document: string; ok: false; error: ConversionError };

export interface RunSummary {
  documents: string[];
  results: DocumentResult[];
  published: boolean;
}

export interface DriverDeps {
  runner?: CommandRunner;
  out?: Output;
  err?: Output;
}

// ─── Directories ─────────────────────────────────────────────────────────────

export function ensureOutputDirs(config: ConverterConfig, out: Output): void {
  const roots: Array<[string, string]> = [
    ['markdown', config.markdownDir],
    ['source script', config.scriptDir],
  ];
  for (const [kind, dir] of roots) {
    if (!fs.existsSync(dir)) {
      out.write(`Creating ${kind} output directory at "${dir}"\n`);
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}

/** Notebook file names in `sourceDir`, sorted. Subdirectories are not searched. */
export function listDocuments(sourceDir: string, extension: string): string[] {
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    throw new ConfigError(`Source directory not found: ${sourceDir}`);
  }
  return fs.readdirSync(sourceDir, { withFileTypes: true })
    .filter(e =>
      e.isFile() &&
      e.name.endsWith(extension)
    )
    .map(e => e.name)
    .sort((a, b) => a.localeCompare(b));
}

function artifactsFor(dir: string, base: string, extension?: string): string[] {
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter(e => {
      if (!e.isFile()) return false;
      const parsed = path.parse(e.name);
      return parsed.name === base && (extension === undefined || parsed.ext === extension);
    })
    .map(e => path.join(dir, e.name));
}

/**
 * Path of the file in `dir` whose base name is `base`. nbconvert picks the
 * script extension from the kernel's language, so it is not known in advance.
 */
export function findArtifact(dir: string, base: string, extension?: string): string | null {
  return artifactsFor(dir, base, extension)[0] ?? null;
}

/** Remove earlier output for `base` so only what the next call writes is found. */
export function clearArtifacts(dir: string, base: string, extension?: string): void {
  for (const file of artifactsFor(dir, base, extension)) fs.rmSync(file, { force: true });
}

// ─── Conversion ──────────────────────────────────────────────────────────────

async function runJob(
  document: string,
  format: TargetFormat,
  config: ConverterConfig,
  runner: CommandRunner,
): Promise<string> {
  const base = path.basename(document, config.extension);
  const dir = outputDirFor(format, config);
  const extension = format === 'markdown' ? '.md' : undefined;
  clearArtifacts(dir, base, extension);

  const result = await runner(config.command, buildArgs({ document, format }, config));
  if (result.code !== 0) {
    throw new ConversionError(document, format, result.code, result.stderr);
  }

  const artifact = findArtifact(dir, base, extension);
  if (!artifact) {
    throw new ConversionError(document, format, result.code, result.stderr,
      `nbconvert --to=${format} wrote no artifact for ${document} into ${dir}`);
  }
  return artifact;
}

/** Script pass, then executed markdown pass. The second is skipped if the first fails. */
export async function convertDocument(
  document: string,
  config: ConverterConfig,
  runner: CommandRunner = runCommand,
): Promise<DocumentResult> {
  try {
    const script = await runJob(document, 'script', config, runner);
    const markdown = await runJob(document, 'markdown', config, runner);
    return { document, ok: true, script, markdown };
  } catch (err) {
    if (err instanceof ConversionError) return { document, ok: false, error: err };
    throw err;
  }
}

function indent(text: string, prefix = '    '): string {
  return text.trimEnd().split('\n').map(line => prefix + line).join('\n');
}

// ─── Run ─────────────────────────────────────────────────────────────────────

export async function runConversion(config: ConverterConfig, deps: DriverDeps = {}): Promise<RunSummary> {
  const runner = deps.runner ?? runCommand;
  const out = deps.out ?? process.stdout;
  const err = deps.err ?? process.stderr;
  const rel = (p: string) => path.relative(process.cwd(), p) || '.';

  const documents = listDocuments(config.sourceDir, config.extension);
  ensureOutputDirs(config, out);

  out.write(`Found ${documents.length} notebook(s) to convert.\n\n`);

  const results: DocumentResult[] = [];
  let halted = false;

  for (const document of documents) {
    out.write(`  ${document} … `);
    const result = await convertDocument(document, config, runner);
    results.push(result);

    if (result.ok) {
      out.write(`OK  →  ${rel(result.script)} + ${rel(result.markdown)}\n`);
      continue;
    }

    out.write(`FAILED\n${indent(result.error.message)}\n`);
    const { stderr } = result.error;
    if (stderr.trim()) err.write(stderr.endsWith('\n') ? stderr : stderr + '\n');

    if (config.failurePolicy === 'halt') {
      halted = true;
      break;
    }
  }

  const converted = results.filter(r => r.ok).length;
  const failed = results.length - converted;
  out.write(`\nDone. ${converted} converted, ${failed} failed.\n`);
  if (halted) {
    out.write(`Stopped early; ${documents.length - results.length} notebook(s) not converted, nothing published.\n`);
  }

  let published = false;
  if (config.publish && !halted) {
    publishTree(config.markdownDir, config.publishDir);
    published = true;
    out.write(`Published  →  ${config.publishDir}\n`);
  }

  out.write(`Scripts    →  ${config.scriptDir}\n`);
  out.write(`Markdown   →  ${config.markdownDir}\n`);

  return { documents, results, published };
}

import path from 'path';
import { spawn } from 'child_process';
import type { ConverterConfig } from './config';

export type TargetFormat = 'script' | 'markdown';

export interface ConversionJob {
  document: string;
  format: TargetFormat;
}

export interface CommandResult {
  code: number | null;
  stderr: string;
}

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export function outputDirFor(format: TargetFormat, config: ConverterConfig): string {
  return format === 'script' ? config.scriptDir : config.markdownDir;
}

/**
 * Argument vector for one nbconvert call. The script pass only converts;
 * the markdown pass executes every code cell so outputs and figures are
 * embedded in the rendering.
 */
export function buildArgs(job: ConversionJob, config: ConverterConfig): string[] {
  const sourcePath = path.join(config.sourceDir, job.document);
  const args = [
    `--ExecutePreprocessor.kernel_name=${config.kernel}`,
    `--to=${job.format}`,
    `--output-dir=${outputDirFor(job.format, config)}`,
  ];
  if (job.format === 'markdown') {
    if (config.template) args.push(`--template=${config.template}`);
    args.push('--execute');
  }
  args.push(sourcePath);
  return args;
}

/** Spawn and await a command. Stdout passes through; stderr is captured. Never rejects. */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    const child = spawn(command, args, { stdio: ['ignore', 'inherit', 'pipe'], shell: process.platform === 'win32' });

    let stderr = '';
    let settled = false;

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (d: string) => { stderr += d; });

    // ENOENT etc. arrive here instead of as an exit code
    child.on('error', (err) => {
      if (settled) return;
      settled = true;
      resolve({ code: null, stderr: stderr + err.message });
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      resolve({ code, stderr });
    });
  });

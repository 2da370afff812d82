import path from 'path';
import { parseArgs } from 'util';
import { ConfigError, errorMessage } from './errors';

export type FailurePolicy = 'halt' | 'continue';

export interface ConverterConfig {
  sourceDir: string;
  markdownDir: string;
  scriptDir: string;
  publishDir: string;
  /** Kernel name handed to nbconvert's ExecutePreprocessor. */
  kernel: string;
  /** Rendering template for the markdown pass, or null for nbconvert's own. */
  template: string | null;
  command: string;
  extension: string;
  failurePolicy: FailurePolicy;
  publish: boolean;
}

export const DEFAULTS = {
  sourceDir:   'notebooks',
  markdownDir: 'markdown',
  scriptDir:   'julia',
  publishDir:  '../documentation/src/examples',
  kernel:      'julia-0.6',
  template:    'markdown_template.tpl',
  command:     'jupyter-nbconvert',
  extension:   '.ipynb',
} as const;

export const USAGE = `Usage:
  tsx convert.ts [options]

Options:
  --source <dir>       notebook directory            (default: ${DEFAULTS.sourceDir})
  --markdown <dir>     rendered markdown output      (default: ${DEFAULTS.markdownDir})
  --scripts <dir>      source script output          (default: ${DEFAULTS.scriptDir})
  --publish <dir>      destination replaced on publish (default: ${DEFAULTS.publishDir})
  --kernel <name>      Jupyter kernel name           (default: ${DEFAULTS.kernel})
  --template <file>    markdown template             (default: ${DEFAULTS.template})
  --no-template        use nbconvert's built-in markdown template
  --nbconvert <cmd>    nbconvert executable          (default: ${DEFAULTS.command})
  --ext <ext>          notebook file extension       (default: ${DEFAULTS.extension})
  --keep-going         convert remaining notebooks after a failure
  --no-publish         skip the publish step
  -h, --help           show this message
`;

export interface ParsedArgs {
  help: boolean;
  config: ConverterConfig;
}

function parseFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        'source':      { type: 'string' },
        'markdown':    { type: 'string' },
        'scripts':     { type: 'string' },
        'publish':     { type: 'string' },
        'kernel':      { type: 'string' },
        'template':    { type: 'string' },
        'no-template': { type: 'boolean' },
        'nbconvert':   { type: 'string' },
        'ext':         { type: 'string' },
        'keep-going':  { type: 'boolean' },
        'no-publish':  { type: 'boolean' },
        'help':        { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (err) {
    throw new ConfigError(errorMessage(err));
  }
}

export function resolveConfig(argv: string[], cwd: string = process.cwd()): ParsedArgs {
  const values = parseFlags(argv);

  if (values['template'] !== undefined && values['no-template']) {
    throw new ConfigError('--template and --no-template are mutually exclusive');
  }

  const resolve = (p: string) => path.resolve(cwd, p);

  const kernel = values['kernel'] ?? DEFAULTS.kernel;
  if (!kernel.trim()) throw new ConfigError('--kernel must not be empty');

  let extension = values['ext'] ?? DEFAULTS.extension;
  if (!extension.startsWith('.')) extension = '.' + extension;
  if (extension === '.') throw new ConfigError('--ext must name an extension');

  const config: ConverterConfig = {
    sourceDir:     resolve(values['source'] ?? DEFAULTS.sourceDir),
    markdownDir:   resolve(values['markdown'] ?? DEFAULTS.markdownDir),
    scriptDir:     resolve(values['scripts'] ?? DEFAULTS.scriptDir),
    publishDir:    resolve(values['publish'] ?? DEFAULTS.publishDir),
    kernel,
    template:      values['no-template'] ? null : resolve(values['template'] ?? DEFAULTS.template),
    command:       values['nbconvert'] ?? DEFAULTS.command,
    extension,
    failurePolicy: values['keep-going'] ? 'continue' : 'halt',
    publish:       !values['no-publish'],
  };

  if (config.markdownDir === config.scriptDir) {
    throw new ConfigError('--markdown and --scripts must be different directories');
  }

  return { help: values['help'] ?? false, config: Object.freeze(config) };
}

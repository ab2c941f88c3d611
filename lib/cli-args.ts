/**
 * Command-line arguments for scripts/generate-clip.ts
 */

import yargs from 'yargs';
import { RunOptionsSchema, type RunOptions } from './pipeline';

export const USAGE = `Usage: generate-clip <website_url> <transcript_file> [options]

Options:
  --clip-index N             Which ranked clip to use (0 = top-ranked)
  --clip-max N               Maximum clips to rank (default 4)
  --whitelist-keywords a b   Keywords to prioritize
  --blacklist-keywords a b   Keywords to avoid
  --output-dir DIR           Directory for debug files (default output)
  --clips-file FILE          Resume from a saved clips document instead of scoring
  --save-analysis            Save the website analysis
  --save-clips               Save the ranked clips document
  --strict                   Reject transcript lines without timestamp or speaker
  --no-enhance               Skip dialogue enhancement`;

export interface CliArgs {
  url: string;
  transcript_file: string;
  clips_file?: string;
  options: RunOptions;
}

// Accepts both `--whitelist-keywords a b` and `--whitelist-keywords a,b`
function keywords(values: string[] | undefined): string[] | undefined {
  return values?.flatMap(value => value.split(','));
}

/**
 * Parses everything after the script name (hideBin(process.argv)).
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const argv = yargs(args)
    .scriptName('generate-clip')
    .option('clip-index', { type: 'number' })
    .option('clip-max', { type: 'number' })
    .option('whitelist-keywords', { type: 'string', array: true })
    .option('blacklist-keywords', { type: 'string', array: true })
    .option('output-dir', { type: 'string', requiresArg: true })
    .option('clips-file', { type: 'string', requiresArg: true })
    .option('save-analysis', { type: 'boolean' })
    .option('save-clips', { type: 'boolean' })
    .option('strict', { type: 'boolean' })
    .option('enhance', { type: 'boolean' })
    .strict()
    .help(false)
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      throw error ?? new Error(`${message}\n\n${USAGE}`);
    })
    .parseSync();

  const positional = argv._.map(String);
  const [url, transcriptFile] = positional;
  const clipsFile = argv['clips-file'];
  if (!url || (!transcriptFile && !clipsFile) || positional.length > 2) {
    throw new Error(USAGE);
  }

  const parsed = RunOptionsSchema.safeParse({
    clip_index: argv['clip-index'],
    clip_max: argv['clip-max'],
    whitelist_keywords: keywords(argv['whitelist-keywords']),
    blacklist_keywords: keywords(argv['blacklist-keywords']),
    output_dir: argv['output-dir'],
    save_analysis: argv['save-analysis'] || undefined,
    save_clips: argv['save-clips'] || undefined,
    strict: argv.strict || undefined,
    enhance: argv.enhance === false ? false : undefined,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid options: ${issues.join('; ')}`);
  }

  return {
    url,
    transcript_file: transcriptFile ?? '',
    clips_file: clipsFile,
    options: parsed.data,
  };
}

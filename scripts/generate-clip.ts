/**
 * Generate a clip locally
 *
 * Usage:
 *   npx tsx scripts/generate-clip.ts https://example.com transcript.txt --clip-max 4 --save-clips
 *   npx tsx scripts/generate-clip.ts https://example.com --clips-file output/clips_abc.json --clip-index 1
 */

import * as fs from 'fs';
import { hideBin } from 'yargs/helpers';
import { parseClipsDocument } from '../lib/clips';
import { parseCliArgs } from '../lib/cli-args';
import { createPipeline, overridesFromOptions } from '../lib/pipeline';
import { formatTimestamp } from '../lib/transcript/parser';
import { Logger } from '../lib/utils';

async function main(): Promise<number> {
  const args = parseCliArgs(hideBin(process.argv));

  const transcript = args.transcript_file ? fs.readFileSync(args.transcript_file, 'utf-8') : undefined;
  const clips = args.clips_file ? parseClipsDocument(fs.readFileSync(args.clips_file, 'utf-8')) : undefined;

  console.log('\n🎬 Generating podcast clip\n');
  console.log('='.repeat(50));
  console.log(`Website:    ${args.url}`);
  console.log(`Transcript: ${args.transcript_file || '(from clips document)'}`);
  console.log(`Clip index: ${args.options.clip_index ?? 0}`);

  const { orchestrator } = createPipeline(overridesFromOptions(args.options));

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n🛑 Cancelling after the current stage...');
    controller.abort();
  });

  const result = await orchestrator.run({
    url: args.url,
    transcript,
    clips,
    selection: { mode: 'index', index: args.options.clip_index ?? 0 },
    signal: controller.signal,
  });

  console.log('\n' + '='.repeat(50));

  if (!result.success) {
    console.error(`❌ Failed at ${result.failed_stage}: [${result.error.kind}] ${result.error.message}`);
    return 1;
  }

  const { clip, media } = result;
  console.log(`✅ Clip rank ${clip.rank} (${formatTimestamp(clip.start_offset)}-${formatTimestamp(clip.end_offset)})`);
  console.log(`   Score:    ${clip.relevance_score.toFixed(3)}`);
  console.log(`   Hook:     ${clip.hook_text}`);
  console.log(`   Enhanced: ${clip.enhancement.applied ? 'yes' : 'no'}`);
  console.log(`   Clips:    ${result.clips_path}`);
  console.log('\n📜 Dialogue:');
  for (const utterance of clip.utterances) {
    console.log(`   ${utterance.speaker_id}: ${utterance.text}`);
  }

  if (media?.final) {
    console.log(`\n🎥 Final video: ${media.final.url}`);
  } else if (media) {
    console.log(`\n🎥 ${media.lines.length} lip-synced line videos ready for compositing`);
  }

  for (const warning of result.warnings) {
    console.log(`⚠️  ${warning}`);
  }

  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    Logger.error('generate-clip failed', { error: error instanceof Error ? error.message : String(error) });
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });

import { emptyMetaConfig, loadMetaConfig } from '@/core/config/metaConfig';
import { errorMessage } from '@/core/errors';
import { generateImages } from '@/core/generate';
import { readEnv } from '@/lib/env';
import { clockSeed, outputPaths, parseArgs, USAGE, UsageError } from './args';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const configPath = args.config ?? readEnv().configPath;
  const meta = configPath ? await loadMetaConfig(configPath) : emptyMetaConfig();
  const seed = args.id ?? clockSeed();
  const { genDest, blurDest } = outputPaths(args.output);

  const { blurhash } = await generateImages({ seed, genDest, blurDest, meta });
  console.log(`blurhash is: ${blurhash}`);
}

main().catch((error: unknown) => {
  console.error(`[cli] ${errorMessage(error)}`);
  if (error instanceof UsageError) console.error(USAGE);
  process.exit(1);
});

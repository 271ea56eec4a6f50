import { mkdir } from 'node:fs/promises';
import { emptyMetaConfig, loadMetaConfig } from '@/core/config/metaConfig';
import { errorMessage } from '@/core/errors';
import { generateImages } from '@/core/generate';
import { readEnv } from '@/lib/env';
import { createApp } from './app';

async function main(): Promise<void> {
  const env = readEnv();
  const meta = env.configPath ? await loadMetaConfig(env.configPath) : emptyMetaConfig();
  await mkdir(env.assetsDir, { recursive: true });

  const app = createApp({ generate: generateImages, assetsDir: env.assetsDir, meta, debug: env.debug });
  app.listen(env.port, env.host, () => {
    console.log(`[server] listening on http://${env.host}:${env.port}`);
  });
}

main().catch((error: unknown) => {
  console.error(`[server] ${errorMessage(error)}`);
  process.exit(1);
});

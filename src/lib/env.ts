/**
 * Lecture de l'environnement d'exécution.
 *
 * Variables reconnues:
 * - PAVAGE_DEBUG=true: active la trace de génération
 * - PAVAGE_CONFIG: chemin du document de configuration par défaut
 * - PAVAGE_ASSETS_DIR: dossier des images servies par le serveur HTTP
 * - PORT / HOST: écoute du serveur HTTP
 */

export type RuntimeEnv = {
  debug: boolean;
  configPath: string | null;
  assetsDir: string;
  port: number;
  host: string;
};

const DEFAULT_PORT = 8000;

function readPort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_PORT;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 && n < 65536 ? n : DEFAULT_PORT;
}

export function readEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const configPath = env.PAVAGE_CONFIG?.trim();
  return {
    debug: env.PAVAGE_DEBUG === 'true',
    configPath: configPath ? configPath : null,
    assetsDir: env.PAVAGE_ASSETS_DIR?.trim() || 'assets',
    port: readPort(env.PORT),
    host: env.HOST?.trim() || '127.0.0.1',
  };
}

export function isDebugEnabled(): boolean {
  return readEnv().debug;
}

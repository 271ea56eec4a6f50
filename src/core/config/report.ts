/**
 * Signalement des défauts de configuration.
 *
 * Un défaut (couleur illisible, jeton de forme inconnu, TOML invalide...) n'est
 * jamais levé: la valeur est remplacée par son défaut et le défaut est signalé.
 */

export type ConfigIssue = {
  /** Chemin de la valeur fautive, ex. `themes.sunset` ou `entry[2].span` */
  path: string;
  message: string;
};

export type ConfigReporter = (issue: ConfigIssue) => void;

export function formatIssue({ path, message }: ConfigIssue): string {
  return path ? `${path}: ${message}` : message;
}

/** Valeur brute lisible dans un message */
export function showValue(raw: unknown): string {
  return typeof raw === 'bigint' ? raw.toString() : JSON.stringify(raw);
}

export const consoleReporter: ConfigReporter = (issue) => {
  console.warn(`[config] ${formatIssue(issue)}`);
};

export const silentReporter: ConfigReporter = () => {};

/** Reporter qui accumule les défauts (tests, page d'erreur) */
export function collectIssues(): { report: ConfigReporter; issues: ConfigIssue[] } {
  const issues: ConfigIssue[] = [];
  return { report: (issue) => issues.push(issue), issues };
}

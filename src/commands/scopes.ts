import { Command } from "commander";
import { log } from "../lib/log";
import { describeScope, legalScopes } from "../lib/scopes";

export function formatScopes(): string[] {
  const names = legalScopes();
  const width = Math.max(...names.map((n) => n.length));
  return [
    `${"(none)".padEnd(width)}  Public read-only access.`,
    ...names.map((n) => `${n.padEnd(width)}  ${describeScope(n) ?? ""}`),
  ];
}

export const scopesCommand = new Command("scopes")
  .description("List the scopes a token can be restricted to")
  .action(() => {
    for (const line of formatScopes()) log.info(line);
  });

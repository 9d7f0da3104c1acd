import { Command } from "commander";
import process from "node:process";
import { issueTokenWith } from "../lib/api";
import { APP_NAME, type CliConfig, loadConfig } from "../lib/config";
import { ValidationError } from "../lib/errors";
import { isVerbose, log, setVerbose } from "../lib/log";
import { fixedOtp, noOtp, type OtpCallback, promptForOtp } from "../lib/otp";
import { Input, Secret } from "../lib/prompt";
import { TokenClient } from "../lib/tokenclient";

export type CreateOptions = {
  user?: string;
  password?: string;
  scope?: string[];
  note?: string;
  noteUrl?: string;
  clientId?: string;
  clientSecret?: string;
  otp?: string;
  apiUrl?: string;
  json?: boolean;
  verbose?: boolean;
};

export type CreateDeps = {
  config?: CliConfig;
  fetch?: typeof fetch;
  interactive?: boolean;
};

async function resolveUser(opts: CreateOptions, cfg: CliConfig, interactive: boolean) {
  const user = (opts.user ?? cfg.user).trim();
  if (user || !interactive) return user;
  return (await Input.prompt({ message: "GitHub username:" }))?.trim() ?? "";
}

async function resolvePassword(opts: CreateOptions, cfg: CliConfig, interactive: boolean) {
  const password = opts.password ?? cfg.password;
  if (password || !interactive) return password;
  return (await Secret.prompt({ message: "Password:" })) ?? "";
}

/**
 * Runs `ghauth create`. Returns the process exit code.
 */
export async function runCreate(opts: CreateOptions, deps: CreateDeps = {}): Promise<number> {
  if (opts.verbose) setVerbose(true);
  const interactive = deps.interactive ?? !!process.stdin.isTTY;
  const cfg = deps.config ?? loadConfig();

  let otpCallback: OtpCallback = noOtp;
  if (opts.otp !== undefined) {
    otpCallback = fixedOtp(opts.otp);
  } else if (interactive) {
    otpCallback = promptForOtp;
  }

  try {
    const client = new TokenClient({
      apiBase: opts.apiUrl ?? cfg.apiBase,
      userAgent: cfg.userAgent,
      timeoutMs: cfg.requestTimeoutMs || undefined,
      fetch: deps.fetch,
      logger: isVerbose() ? log : undefined,
    });

    const user = await resolveUser(opts, cfg, interactive);
    const password = await resolvePassword(opts, cfg, interactive);

    log.debug(`Requesting authorization for ${user || "(no user)"} from ${client.endpoint}`);

    const record = await issueTokenWith(
      {
        user,
        password,
        scopes: opts.scope ?? [],
        note: opts.note ?? `${APP_NAME} (${new Date().toISOString()})`,
        note_url: opts.noteUrl,
        client_id: opts.clientId,
        client_secret: opts.clientSecret,
      },
      otpCallback,
      client,
    );

    if (opts.json) {
      log.info(JSON.stringify(record, null, 2));
    } else {
      log.info(record.token);
    }
    log.debug(`Authorization ${record.id} created with scopes [${record.scopes.join(", ")}]`);
    return 0;
  } catch (e) {
    log.error(e);
    return e instanceof ValidationError ? 2 : 1;
  }
}

// -s repo -s gist and -s repo,gist both give ["repo", "gist"]
export function collectScopes(value: string, previous: string[] = []) {
  return [...previous, ...value.split(",").map((s) => s.trim()).filter(Boolean)];
}

export const createCommand = new Command("create")
  .description("Create a new OAuth authorization token (non-web flow)")
  .option("-u, --user <user>", `Account username (or ${APP_NAME.toUpperCase()}_USER)`)
  .option("-p, --password <password>", `Account password (or ${APP_NAME.toUpperCase()}_PASSWORD)`)
  .option("-s, --scope <scope>", "Scope to request; repeat or comma-separate", collectScopes)
  .option("--note <note>", "Name shown in the account's authorized applications list")
  .option("--note-url <url>", "URL shown next to the note")
  .option("--client-id <id>", "OAuth application client id (20 hex chars)")
  .option("--client-secret <secret>", "OAuth application client secret (40 hex chars)")
  .option("--otp <code>", "Two-factor code to use if challenged (skips the prompt)")
  .option("--api-url <url>", "API base URL, e.g. for GitHub Enterprise")
  .option("--json", "Print the whole authorization record as JSON")
  .option("--verbose", "Debug output on stderr")
  .action(async (opts: CreateOptions) => {
    process.exitCode = await runCreate(opts);
  });

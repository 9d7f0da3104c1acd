import process from "node:process";

const COLOR_ENABLED = !process.env["NO_COLOR"] && process.stdout.isTTY === true;

let verbose = !!process.env["DEBUG"];

const paint = (code: number) => (s: string) => COLOR_ENABLED ? `\x1b[${code}m${s}\x1b[0m` : s;
const dim = paint(90);
const yellow = paint(33);
const red = paint(31);

function render(a: unknown): string {
  if (typeof a === "string") return a;
  if (a instanceof Error) return formatError(a);
  if (typeof a === "object" && a !== null) {
    try {
      return JSON.stringify(a);
    } catch {
      return String(a);
    }
  }
  return String(a);
}

const line = (args: unknown[]) => args.map(render).join(" ");

// Our error classes carry their diagnostics in toString(); anything else gets name: message.
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    if (err.toString !== Error.prototype.toString) return err.toString();
    return err.message ? `${err.name || "Error"}: ${err.message}` : err.name || "Error";
  }
  return render(err);
}

export function setVerbose(on: boolean) {
  verbose = on;
}

export function isVerbose() {
  return verbose;
}

// stdout carries results only (the token); status and diagnostics go to stderr.
export const log = {
  debug: (...args: unknown[]) => {
    if (verbose) console.error(dim(`·· ${line(args)}`));
  },
  info: (...args: unknown[]) => console.log(line(args)),
  warn: (...args: unknown[]) => console.error(yellow(`⚠ ${line(args)}`)),
  error: (...args: unknown[]) => console.error(red(`✖ ${line(args)}`)),
};

export type Logger = Pick<typeof log, "debug">;

export type ReconcileCommand =
  | { action: "list" }
  | { action: "review"; id: number }
  | { action: "apply"; id: number; fields: string[]; all: boolean; user?: string; comments?: string }
  | { action: "discard"; id: number };

function readOption(argv: string[], name: string): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith(`--${name}=`)) return arg.slice(name.length + 3);
    if (arg === `--${name}`) return argv[i + 1];
  }
  return undefined;
}

function positionals(argv: string[], valued: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      if (valued.includes(arg.slice(2))) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

/**
 * reconcile                       list pending
 * reconcile <id>                  review
 * reconcile <id> field [field..]  apply named fields
 * reconcile <id> --all            apply every remaining difference
 * reconcile <id> --discard        drop the staged artifact
 */
export function parseReconcileArgs(argv: string[]): ReconcileCommand {
  const [idText, ...fields] = positionals(argv, ["user", "comments"]);
  if (idText === undefined) return { action: "list" };

  const id = Number(idText);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new Error(`Identity key must be a positive integer, got "${idText}"`);
  }
  if (argv.includes("--discard")) return { action: "discard", id };

  const all = argv.includes("--all");
  if (!all && fields.length === 0) return { action: "review", id };
  return { action: "apply", id, fields, all, user: readOption(argv, "user"), comments: readOption(argv, "comments") };
}

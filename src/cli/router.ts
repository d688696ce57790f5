import { isLedgerError } from "../errors";

export type CommandHandler = (args: string[]) => void | Promise<void>;

const commands = new Map<string, CommandHandler>();

export function registerCommand(name: string, handler: CommandHandler): void {
  commands.set(name, handler);
}

export async function routeCommand(argv: string[]): Promise<void> {
  const command = argv[0];
  const args = argv.slice(1);

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return;
  }

  const handler = commands.get(command);
  if (!handler) {
    console.error(`Unknown command: ${command}`);
    console.error('Run "ledgerline help" for available commands.');
    process.exitCode = 1;
    return;
  }

  try {
    await handler(args);
  } catch (err) {
    if (!isLedgerError(err)) throw err;
    console.error(`${err.code}: ${err.message}`);
    process.exitCode = 1;
  }
}

function printHelp(): void {
  console.log(`ledgerline: bank statement normalizer and budget analyzer

Usage: ledgerline <command> [options]

Commands:
  process <file>   Normalize a CSV or PDF statement and summarize it
                   --out=path       write the canonical CSV
                   --currency=XXX   report amounts in this currency
                   --model=path     classifier model artifact
  budget <file>    Budget recommendations and alerts for a statement
                   --currency=XXX, --model=path as above
  help             Show this help message`);
}

import "dotenv/config";
import { DateConverter } from "../date-converter";
import { DateConversionError, UserError } from "../lib/common";
import { LocalDate } from "../lib/date";
import { DB } from "../lib/db";

const USAGE =
  "Usage: convert-date <text> [--from <pattern>] [--to <pattern>]\n" +
  "       convert-date --today|--db [--to <pattern>]";

export class UsageError extends UserError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface ConvertArgs {
  text?: string;
  from?: string;
  to?: string;
  today: boolean;
  db: boolean;
}

function optionValue(argv: string[], i: number): string {
  const value = argv[i + 1];
  if (value === undefined) {
    throw new UsageError(`${argv[i]} needs a pattern`);
  }
  return value;
}

/** Throws UsageError for arguments the command cannot act on. */
export function parseArgs(argv: string[]): ConvertArgs {
  const args: ConvertArgs = { today: false, db: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case "--from":
        args.from = optionValue(argv, i++);
        break;
      case "--to":
        args.to = optionValue(argv, i++);
        break;
      case "--today":
        args.today = true;
        break;
      case "--db":
        args.db = true;
        break;
      default:
        if (arg.startsWith("--")) {
          throw new UsageError(`Unknown option ${arg}`);
        }
        if (args.text !== undefined) {
          throw new UsageError(`Unexpected argument '${arg}'`);
        }
        args.text = arg;
    }
  }

  if (args.today && args.db) {
    throw new UsageError("--today and --db cannot be used together");
  }
  if (args.text !== undefined && (args.today || args.db)) {
    throw new UsageError("<text> cannot be combined with --today or --db");
  }
  if (args.text === undefined && args.from !== undefined) {
    throw new UsageError("--from only applies to <text>");
  }

  return args;
}

/** Renders the converted date, using DATE_PATTERN when --to is absent. */
export function render(
  converter: DateConverter,
  to: string | undefined = process.env.DATE_PATTERN
): string {
  return to ? converter.toString(to) : converter.toString();
}

export function convertText(text: string, args: ConvertArgs): string {
  const converter = args.from
    ? DateConverter.from(text, args.from)
    : DateConverter.from(text);
  return render(converter, args.to);
}

async function resolveConverter(args: ConvertArgs): Promise<DateConverter | null> {
  if (args.db) {
    const db = new DB();
    try {
      return DateConverter.from(await db.currentDate());
    } finally {
      await db.close();
    }
  }
  if (args.today) {
    return DateConverter.from(LocalDate.today());
  }
  return null;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.text !== undefined) {
    console.log(convertText(args.text, args));
    return;
  }

  const converter = await resolveConverter(args);
  if (!converter) {
    console.log(USAGE);
    process.exit(1);
  }
  console.log(render(converter, args.to));
}

if (require.main === module) {
  main().catch((err) => {
    if (err instanceof UsageError) {
      console.error(`${err.message}\n${USAGE}`);
    } else if (err instanceof DateConversionError) {
      console.error(`${err.name}: ${err.message}`);
    } else {
      console.error("Error converting date:", err);
    }
    process.exit(1);
  });
}

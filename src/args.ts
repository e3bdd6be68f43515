import { COMMENT_MARKER, DEFAULT_NAME_TEMPLATE, DEFAULT_SEPARATOR, MAX_FILENAME_LENGTH } from "./config";
import { UsageError } from "./errors";
import { validateTemplate } from "./filesystem";
import type { EntryFormat, EntryParserOptions, FailurePolicy, NamingOptions } from "./types";

export type CliOptions = {
  timingFiles: string[];
  source: string | null;
  outputDir: string | null;
  format: EntryFormat;
  separator: string;
  template: string;
  extension: string | null;
  album: string | null;
  policy: FailurePolicy;
  dryRun: boolean;
  resume: boolean;
  tags: boolean;
  help: boolean;
};

export const USAGE = `Usage: mixtape-split <timing-file>... [options]

Splits long audio files into tracks described by timing files. Each timing
file is handled on its own; a failing file does not stop the next one.

Options:
  -i, --source <path|url>  Source audio for a single timing file (default: the one the file names)
  -o, --output <dir>       Output directory (default: beside the source, named after it)
  -f, --format <line|pipe> Timing file format (default: line)
  -s, --separator <text>   Artist/title separator for the line format (default: "${DEFAULT_SEPARATOR}")
  -t, --template <text>    Output name template (default: "${DEFAULT_NAME_TEMPLATE}")
                           Tokens: {{artist}} {{title}} {{index}} {{trackNumber}} {{album}}
  -e, --ext <ext>          Output extension (default: the source's)
  -a, --album <name>       Album tag (default: the source's file name)
      --continue           Keep going after a failed track and report at the end
      --dry-run            Print the plan without extracting anything
      --resume             Skip tracks recorded as extracted (needs DATABASE_URL)
      --no-tags            Do not write title/artist/album tags
  -h, --help               Show this help`;

const VALUE_FLAGS: Record<string, keyof CliOptions> = {
  "-i": "source",
  "--source": "source",
  "-o": "outputDir",
  "--output": "outputDir",
  "-f": "format",
  "--format": "format",
  "-s": "separator",
  "--separator": "separator",
  "-t": "template",
  "--template": "template",
  "-e": "extension",
  "--ext": "extension",
  "-a": "album",
  "--album": "album",
};

function parseFormat(value: string): EntryFormat {
  if (value === "line" || value === "pipe") {
    return value;
  }
  throw new UsageError(`Unknown format '${value}' (expected line or pipe)`);
}

export function parseArgs(argv: string[]): CliOptions {
  const positional: string[] = [];
  const values = new Map<keyof CliOptions, string>();
  let policy: FailurePolicy = "abort";
  let dryRun = false;
  let resume = false;
  let tags = true;
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    const equalsIndex = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = equalsIndex === -1 ? arg : arg.slice(0, equalsIndex);
    const inlineValue = equalsIndex === -1 ? undefined : arg.slice(equalsIndex + 1);

    const key = VALUE_FLAGS[flag];
    if (key) {
      const value = inlineValue ?? argv[++i];
      if (value === undefined) {
        throw new UsageError(`Missing value for ${flag}`);
      }
      values.set(key, value);
      continue;
    }

    switch (flag) {
      case "--continue":
        policy = "continue";
        break;
      case "--dry-run":
        dryRun = true;
        break;
      case "--resume":
        resume = true;
        break;
      case "--no-tags":
        tags = false;
        break;
      case "-h":
      case "--help":
        help = true;
        break;
      default:
        if (flag.startsWith("-")) {
          throw new UsageError(`Unknown option ${flag}`);
        }
        positional.push(arg);
    }
  }

  if (!help && positional.length === 0) {
    throw new UsageError("Missing timing file");
  }
  const source = values.get("source") ?? null;
  if (source !== null && positional.length > 1) {
    throw new UsageError("--source can only be used with a single timing file");
  }

  const template = values.get("template") ?? DEFAULT_NAME_TEMPLATE;
  validateTemplate(template);

  const separator = values.get("separator") ?? DEFAULT_SEPARATOR;
  if (!separator) {
    throw new UsageError("Separator cannot be empty");
  }

  return {
    timingFiles: positional,
    source,
    outputDir: values.get("outputDir") ?? null,
    format: parseFormat(values.get("format") ?? "line"),
    separator,
    template,
    extension: values.get("extension") ?? null,
    album: values.get("album") ?? null,
    policy,
    dryRun,
    resume,
    tags,
    help,
  };
}

export function toParserOptions(options: CliOptions): EntryParserOptions {
  return { format: options.format, separator: options.separator, commentMarker: COMMENT_MARKER };
}

export function toNamingOptions(options: CliOptions): NamingOptions {
  return {
    template: options.template,
    maxLength: MAX_FILENAME_LENGTH,
    ...(options.album ? { album: options.album } : {}),
  };
}

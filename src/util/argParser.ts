import fs from "fs";

import yaml from "js-yaml";
import yargs, { Options } from "yargs";
import { hideBin } from "yargs/helpers";

import {
  DEFAULT_SCAN_CONTENT_TYPE,
  DEFAULT_SESSION_TOKENS,
  ExitCodes,
  ParameterHandling,
} from "./constants.js";
import {
  DEFAULT_EXCLUDE_LOG_CONTEXTS,
  LOG_CONTEXT_TYPES,
  LogContext,
  formatErr,
  logger,
} from "./logger.js";

export type RunnerArgs = {
  urls: string[];
  base: string | null;
  scanFiles: string[];
  contentType: string;
  canonicalizeFound: boolean;
  handleParameters: ParameterHandling;
  handleStructuredSegments: boolean;
  sessionTokens: string[];
  excludeParams: string[];
  logging: string[];
  logLevel: string[];
  logContext: LogContext[];
  logExcludeContext: LogContext[];
  logFile: string | null;
};

function stringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((v): v is string => typeof v === "string");
  }
  return typeof value === "string" && value ? [value] : [];
}

function logContextList(value: unknown): LogContext[] {
  const contexts: LogContext[] = [];
  for (const name of stringList(value)) {
    const context = LOG_CONTEXT_TYPES.find((c) => c === name);
    if (context) {
      contexts.push(context);
    }
  }
  return contexts;
}

function parameterHandling(value: unknown): ParameterHandling | undefined {
  return Object.values(ParameterHandling).find((mode) => mode === value);
}

// ============================================================================
class ArgParser {
  get cliOpts(): { [key: string]: Options } {
    const coerce = (array: string[]) => {
      return array.flatMap((v) => String(v).split(",")).filter((x) => !!x);
    };

    return {
      url: {
        alias: "urls",
        describe: "URL to canonicalize, can be specified multiple times",
        type: "array",
        string: true,
        default: [],
      },

      urlFile: {
        describe:
          "If set, read a list of urls to canonicalize, one per line, from the specified file",
        type: "string",
      },

      base: {
        describe:
          "Base URL to resolve relative urls against, also used as the URL of scanned files",
        type: "string",
      },

      scanFile: {
        describe: "Text file to scan for http(s) URLs, can be specified multiple times",
        type: "array",
        string: true,
        default: [],
      },

      contentType: {
        describe: "Content type declared for scanned files",
        type: "string",
        default: DEFAULT_SCAN_CONTENT_TYPE,
      },

      canonicalizeFound: {
        describe: "If set, canonicalize each URL found by the text scan",
        type: "boolean",
        default: false,
      },

      handleParameters: {
        describe:
          "How query parameters are handled when canonicalizing: keep all, keep only names, or drop them",
        type: "string",
        default: ParameterHandling.UseAll,
        choices: Object.values(ParameterHandling),
      },

      handleStructuredSegments: {
        describe:
          "If set, apply the parameter handling to record-call style path segments, eg. Book(id=1)",
        type: "boolean",
        default: false,
      },

      sessionTokens: {
        describe:
          "Comma-separated list of session token parameter names, always removed from URLs",
        type: "array",
        default: DEFAULT_SESSION_TOKENS,
        coerce,
      },

      excludeParams: {
        describe:
          "Comma-separated list of additional parameter names removed from URLs",
        type: "array",
        default: [],
        coerce,
      },

      logging: {
        describe: "Logging options, can include: debug",
        type: "array",
        default: [],
        coerce,
      },

      logLevel: {
        describe: "Comma-separated list of log levels to include in logs",
        type: "array",
        default: [],
        coerce,
      },

      context: {
        alias: "logContext",
        describe: "Comma-separated list of contexts to include in logs",
        type: "array",
        default: [],
        choices: LOG_CONTEXT_TYPES,
        coerce,
      },

      logExcludeContext: {
        describe: "Comma-separated list of contexts to NOT include in logs",
        type: "array",
        default: DEFAULT_EXCLUDE_LOG_CONTEXTS,
        choices: LOG_CONTEXT_TYPES,
        coerce,
      },

      logFile: {
        describe: "If set, also append logs to this file",
        type: "string",
      },
    };
  }

  parseArgs(argvParams?: string[]) {
    let argv = argvParams || process.argv;

    const envArgs = process.env.CANON_ARGS;

    if (envArgs) {
      argv = argv.concat(this.splitArgsQuoteSafe(envArgs));
    }

    let origConfig: object = {};

    const parsed = yargs(hideBin(argv))
      .usage("crawl-canon [options]")
      .option(this.cliOpts)
      .config("config", "Path to YAML config file", (configPath: string) => {
        const loaded = yaml.load(fs.readFileSync(configPath, "utf8"));
        if (typeof loaded !== "object" || loaded === null) {
          throw new Error(`Config file ${configPath} must contain a mapping`);
        }
        origConfig = loaded;
        return origConfig;
      })
      .check((argv) => this.validateArgs(argv))
      .parseSync();

    return { parsed: this.toRunnerArgs(parsed), origConfig };
  }

  splitArgsQuoteSafe(args: string): string[] {
    // Split process.env.CANON_ARGS on spaces but retaining spaces within double quotes
    const regex = /"[^"]+"|[^\s]+/g;
    const res = args.match(regex);
    return res ? res.map((e) => e.replace(/"(.+)"/, "$1")) : [];
  }

  validateArgs(argv: Record<string, unknown>) {
    if (!parameterHandling(argv.handleParameters)) {
      throw new Error(
        `Invalid --handleParameters value: ${String(argv.handleParameters)}`,
      );
    }

    if (argv.urlFile !== undefined && typeof argv.urlFile !== "string") {
      throw new Error("--urlFile must be a path");
    }

    return true;
  }

  toRunnerArgs(argv: Record<string, unknown>): RunnerArgs {
    const urls = stringList(argv.url);

    if (typeof argv.urlFile === "string") {
      let urlFile = "";
      try {
        urlFile = fs.readFileSync(argv.urlFile, "utf8");
      } catch (e) {
        logger.fatal(
          "Unable to read url file",
          { urlFile: argv.urlFile, ...formatErr(e) },
          "config",
          ExitCodes.GenericError,
        );
      }
      for (const url of urlFile.split("\n")) {
        if (url.trim()) {
          urls.push(url.trim());
        }
      }
    }

    return {
      urls,
      base: typeof argv.base === "string" ? argv.base : null,
      scanFiles: stringList(argv.scanFile),
      contentType:
        typeof argv.contentType === "string"
          ? argv.contentType
          : DEFAULT_SCAN_CONTENT_TYPE,
      canonicalizeFound: argv.canonicalizeFound === true,
      handleParameters:
        parameterHandling(argv.handleParameters) ?? ParameterHandling.UseAll,
      handleStructuredSegments: argv.handleStructuredSegments === true,
      sessionTokens: stringList(argv.sessionTokens),
      excludeParams: stringList(argv.excludeParams),
      logging: stringList(argv.logging),
      logLevel: stringList(argv.logLevel),
      logContext: logContextList(argv.context),
      logExcludeContext: logContextList(argv.logExcludeContext),
      logFile: typeof argv.logFile === "string" ? argv.logFile : null,
    };
  }
}

export function parseArgs(argv?: string[]) {
  return new ArgParser().parseArgs(argv);
}

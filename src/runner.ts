import fs from "node:fs";

import { RunnerArgs } from "./util/argParser.js";
import { CanonicalResult, UrlCanonicalizer } from "./util/canonicalizer.js";
import { ExitCodes } from "./util/constants.js";
import { formatErr, logger } from "./util/logger.js";
import { SessionTokenRegistry } from "./util/sessiontokens.js";
import { FoundUrl, TextUrlScanner } from "./util/textscanner.js";

export type ResultWriter = (line: string) => void;

const SCAN_DEPTH = 0;

// ============================================================================
export class CanonRunner {
  params: RunnerArgs;

  sessionTokens: SessionTokenRegistry;
  canonicalizer: UrlCanonicalizer;
  scanner: TextUrlScanner;

  write: ResultWriter;

  stats = {
    canonical: 0,
    unsupported: 0,
    malformed: 0,
    found: 0,
  };

  exitCode = ExitCodes.Success;

  constructor(
    params: RunnerArgs,
    write: ResultWriter = (line) => process.stdout.write(line + "\n"),
  ) {
    this.params = params;
    this.write = write;

    const debugLogging = this.params.logging.includes("debug");
    logger.setDebugLogging(debugLogging);
    logger.setLogLevel(this.params.logLevel);
    logger.setContext(this.params.logContext);
    logger.setExcludeContext(this.params.logExcludeContext);

    if (this.params.logFile) {
      logger.openLog(this.params.logFile);
    }

    this.sessionTokens = new SessionTokenRegistry(this.params.sessionTokens);

    this.canonicalizer = new UrlCanonicalizer({
      handleParameters: this.params.handleParameters,
      handleStructuredSegments: this.params.handleStructuredSegments,
      sessionTokens: this.sessionTokens,
    });

    this.scanner = new TextUrlScanner();
  }

  async run(): Promise<ExitCodes> {
    logger.debug(
      "Starting",
      {
        urls: this.params.urls.length,
        scanFiles: this.params.scanFiles,
        handleParameters: this.params.handleParameters,
        handleStructuredSegments: this.params.handleStructuredSegments,
        sessionTokens: this.sessionTokens.names,
      },
      "config",
    );

    for (const url of this.params.urls) {
      this.canonicalizeInput(url);
    }

    for (const filename of this.params.scanFiles) {
      this.scanFile(filename);
    }

    logger.info("Done", { ...this.stats, exitCode: this.exitCode });

    await logger.closeLog();

    return this.exitCode;
  }

  canonicalize(url: string): CanonicalResult {
    const result = this.canonicalizer.canonicalize(
      url,
      this.params.base,
      this.params.excludeParams,
    );
    this.stats[result.status]++;
    return result;
  }

  canonicalizeInput(input: string) {
    const result = this.canonicalize(input);

    if (result.status === "malformed") {
      logger.warn("Malformed URL", { input, error: result.error }, "canonical");
    }

    this.write(JSON.stringify({ input, ...result }));
  }

  scanFile(filename: string) {
    const resource = {
      url: this.params.base,
      contentType: this.params.contentType,
    };

    if (!this.scanner.canScan(resource, filename, false)) {
      logger.warn(
        "Content type not eligible for text scan, skipping",
        { filename, contentType: resource.contentType },
        "links",
      );
      return;
    }

    let body: string;

    try {
      body = fs.readFileSync(filename, "utf8");
    } catch (e) {
      logger.error("Unable to read file to scan", {
        filename,
        ...formatErr(e),
      });
      this.exitCode = ExitCodes.GenericError;
      return;
    }

    const listener = (found: FoundUrl) => this.writeFound(filename, found);

    this.scanner.addListener(listener);
    try {
      this.scanner.scan(resource, body, SCAN_DEPTH);
    } finally {
      this.scanner.removeListener(listener);
    }
  }

  writeFound(source: string, { url, depth }: FoundUrl) {
    this.stats.found++;

    const entry: Record<string, unknown> = { source, found: url, depth };

    if (this.params.canonicalizeFound) {
      entry.canonical = this.canonicalize(url);
    }

    this.write(JSON.stringify(entry));
  }
}

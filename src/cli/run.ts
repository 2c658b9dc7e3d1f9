import { AuditLogClient } from "../client";
import type { RequestInterceptor, ResponseInterceptor } from "../config";
import { AuditLogError, ConfigError } from "../errors";
import type { OutputTarget } from "../models";
import { defaultOutputPath } from "../writer";
import { USAGE, parseCliArgs } from "./args";
import { resolveCredential } from "./credentials";
import { loadEnv } from "./env";
import type { Logger } from "./logger";
import { createLogger, levelFor } from "./logger";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDeps {
  env: Record<string, string | undefined>;
  interactive: boolean;
  prompt?: (question: string) => Promise<string>;
  stdout?: (text: string) => void;
  stderr?: (line: string) => void;
  now?: Date;
}

function requestLogger(logger: Logger): RequestInterceptor {
  return ({ method, url }) => {
    logger.debug(`${method} ${url}`);
  };
}

function responseLogger(logger: Logger): ResponseInterceptor {
  return (response, { url }) => {
    logger.debug(`${response.status} ${url}`);
    if (response.headers?.get("x-ratelimit-remaining") === "0") {
      logger.warn("API rate limit exhausted; further requests will fail until it resets");
    }
  };
}

function report(error: unknown, logger: Logger): number {
  if (error instanceof ConfigError) {
    logger.error(error.message);
    logger.error("Run with --help for usage.");
    return EXIT_USAGE;
  }
  if (error instanceof AuditLogError) {
    logger.error(`${error.name}: ${error.message}`);
    return EXIT_FAILURE;
  }
  logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) logger.debug(error.stack);
  return EXIT_FAILURE;
}

/** Runs one export and resolves to the process exit code. */
export async function run(argv: string[], deps: CliDeps): Promise<number> {
  const sink = deps.stderr ?? ((line: string) => console.error(line));
  let logger = createLogger("info", sink);

  try {
    const parsed = parseCliArgs(argv);
    if (parsed.kind === "help") {
      (deps.stdout ?? ((text: string) => process.stdout.write(text)))(USAGE);
      return EXIT_OK;
    }
    const { options } = parsed;
    logger = createLogger(levelFor(options), sink);

    const env = loadEnv(deps.env);
    const token = await resolveCredential({
      env,
      interactive: deps.interactive,
      prompt: deps.prompt,
    });

    const client = new AuditLogClient({
      apiUrl: options.apiUrl ?? env.GITHUB_API_URL,
      token,
      timeout: options.timeout ?? env.AUDIT_LOG_TIMEOUT,
      onRequest: [requestLogger(logger)],
      onResponse: [responseLogger(logger)],
      onPage: (page, index) => {
        logger.debug(`Page ${index + 1}: ${page.records.length} entries`);
      },
    });

    const now = deps.now ?? new Date();
    const outputs: OutputTarget[] = options.formats.map((format) => ({
      format,
      path: options.output ?? defaultOutputPath(format, now),
    }));

    logger.info(`Fetching ${client.auditLog.url(options.query)}`);
    const result = await client.auditLog.export(options.query, outputs, {
      columns: options.columns,
    });

    logger.info(`Total entries retrieved: ${result.count}`);
    for (const file of result.files) {
      logger.info(`Data saved to ${file}`);
    }
    return EXIT_OK;
  } catch (error) {
    return report(error, logger);
  }
}

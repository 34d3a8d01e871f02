import { randomUUID } from "node:crypto";

import { createLogger, writeStderr, type LogWriter } from "@cuzick/logger";
import { createConsolePresenter } from "@cuzick/report";
import { cuzick, isCuzickError } from "@cuzick/stats";

import { buildCliConfig, USAGE, type CliConfig } from "./config.js";
import { loadDataset } from "./dataset.js";

export interface CliIo {
  readonly stdout: (text: string) => void;
  readonly log: LogWriter;
}

const defaultIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  log: writeStderr,
};

const stringifyError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

/**
 * Run the test for one dataset; resolves to the process exit code.
 */
export const runCli = async (
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIo = defaultIo,
): Promise<number> => {
  let config: CliConfig;
  try {
    config = buildCliConfig(argv, env);
  } catch (error) {
    io.stdout(`${USAGE}\n`);
    createLogger("services/cli", { write: io.log }).error("Invalid arguments", {
      error: stringifyError(error),
    });
    return 1;
  }

  const logger = createLogger("services/cli", { level: config.logLevel, write: io.log });
  const analysisId = randomUUID();

  try {
    const dataset = await loadDataset(config.input);
    logger.debug("Dataset loaded", {
      analysisId,
      input: config.input,
      observations: dataset.observations.length,
    });

    const presenter =
      config.format === "text" ? createConsolePresenter({ write: io.stdout, logger }) : undefined;
    const result = cuzick(dataset.observations, {
      scores: config.scores ?? dataset.scores,
      display: config.display,
      presenter,
    });

    if (config.format === "json") {
      io.stdout(`${JSON.stringify(result, null, 2)}\n`);
    }

    logger.info("Cuzick test completed", {
      analysisId,
      input: config.input,
      groups: result.groups,
      observations: result.total,
      z: result.z,
      pValue: result.pValue,
    });
    return 0;
  } catch (error) {
    logger.error("Cuzick test failed", {
      analysisId,
      input: config.input,
      error: stringifyError(error),
      ...(isCuzickError(error) ? { code: error.code, details: error.details } : {}),
    });
    return 1;
  }
};

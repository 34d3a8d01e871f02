import type { Logger } from "@cuzick/logger";
import type { CuzickResult, ResultPresenter } from "@cuzick/stats";

import { renderReport } from "./report.js";

export interface ConsolePresenterOptions {
  /** Defaults to process.stdout */
  readonly write?: (text: string) => void;
  readonly logger?: Logger;
}

/**
 * Presenter that writes the rendered report for every result it receives
 */
export const createConsolePresenter = (options: ConsolePresenterOptions = {}): ResultPresenter => {
  const write =
    options.write ??
    ((text: string): void => {
      process.stdout.write(text);
    });

  return {
    present(result: CuzickResult): void {
      write(renderReport(result));
      options.logger?.debug("Report rendered", {
        groups: result.groups,
        observations: result.total,
      });
    },
  };
};

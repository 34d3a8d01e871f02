/**
 * Console rendering of Cuzick test results
 * @packageDocumentation
 */

export { formatNumber, renderTable } from "./table.js";
export { renderReport, DIVIDER } from "./report.js";
export { createConsolePresenter, type ConsolePresenterOptions } from "./presenter.js";

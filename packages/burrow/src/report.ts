import chalk from "chalk";
import type { Logger } from "@burrow/common";
import type { InstallReport } from "@burrow/package-installer";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_SCRIPTS_FAILED = 2;

export function exitCodeFor(report: InstallReport): number {
  if (report.fatalError !== undefined) {
    return EXIT_FATAL;
  }
  return report.failedScripts.length > 0 ? EXIT_SCRIPTS_FAILED : EXIT_OK;
}

export function summarize(report: InstallReport): string {
  const parts = [
    `${report.installed} installed`,
    `${report.upToDate} up to date`,
    `${report.fetched} downloaded`,
    `${report.cacheHits} from cache`,
  ];
  if (report.linkedBins > 0) {
    parts.push(`${report.linkedBins} bins linked`);
  }
  return parts.join(", ");
}

export function renderReport(report: InstallReport, logger: Logger, took: number): void {
  if (report.fatalError !== undefined) {
    logger.info(`💥 ${chalk.redBright("An error occurred while installing.")}`);
    logger.info(report.fatalError.message);
    if (report.failedPackages.length > 0) {
      logger.info(chalk.gray(`Failed: ${report.failedPackages.join(", ")}`));
    }
    return;
  }
  for (const failure of report.failedScripts) {
    logger.info(
      `⚠️  ${chalk.yellowBright(failure.script)} of ${chalk.cyanBright(failure.package)} exited with ${
        failure.exitCode === null ? "a signal" : `code ${failure.exitCode}`
      }`
    );
  }
  logger.info(chalk.greenBright(`🎉 Done. ${summarize(report)}. Took ${took}ms.`));
}

import chalk from "chalk";

const PREFIX = "[tracepack]";

export function isDebugEnabled(): boolean {
  const flag = process.env.TRACEPACK_DEBUG;
  return !!flag && flag !== "0" && flag.toLowerCase() !== "false";
}

export function logInfo(message: string) {
  console.log(chalk.cyan(`${PREFIX} ${message}`));
}

export function logWarn(message: string) {
  console.warn(chalk.yellow(`${PREFIX} ${message}`));
}

export function logError(message: string, err?: unknown) {
  console.error(chalk.red(`${PREFIX} ${message}`));
  if (err) console.error(err);
}

export function logDebug(message: string) {
  if (!isDebugEnabled()) return;
  console.log(chalk.gray(`${PREFIX} ${message}`));
}

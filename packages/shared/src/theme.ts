import chalk from "chalk";

export const dim = chalk.gray;
export const emphasize = chalk.bold;
export const highlight = chalk.yellowBright;
export const highlightAlternate = chalk.blueBright;
export const statusPending = chalk.yellowBright;
export const statusFailed = chalk.redBright;
export const statusSuccess = chalk.greenBright;
export const statusWarning = chalk.yellow;

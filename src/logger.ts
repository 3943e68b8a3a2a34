import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
  // print a suggested command so it stands out from the surrounding text.
  command(command: string): void;
}

export function createConsoleLogger(debugEnabled = false): Logger {
  return {
    info: (message) => console.log(message),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
    debug: (message) => {
      if (debugEnabled) console.error(chalk.gray(`[debug] ${message}`));
    },
    command: (command) => {
      console.log("------------------------------------------");
      console.log(`\n   $ ${chalk.bold.cyan(command)}\n`);
      console.log("------------------------------------------");
    },
  };
}


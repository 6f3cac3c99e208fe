import chalk from 'chalk';

function debugEnabled(): boolean {
  return Boolean(process.env.DEBUG || process.env.MATRIXRUN_DEBUG);
}

export const logger = {
  info(msg: string) {
    console.log(chalk.blue('ℹ'), msg);
  },

  success(msg: string) {
    console.log(chalk.green('✔'), msg);
  },

  warn(msg: string) {
    console.log(chalk.yellow('⚠'), msg);
  },

  error(msg: string) {
    console.error(chalk.red('✖'), msg);
  },

  debug(msg: string) {
    if (debugEnabled()) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  header(msg: string) {
    console.log();
    console.log(chalk.bold(msg));
    console.log();
  },

  dim(msg: string) {
    console.log(chalk.dim(msg));
  },

  skipped(msg: string) {
    console.log(chalk.gray('○'), chalk.gray(msg));
  },
};

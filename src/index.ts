#!/usr/bin/env node

import chalk from 'chalk';
import { ExitCode, SSM_SDK_PACKAGE } from './config.js';
import { describeError } from './utils/errors.js';
import { isPackageAvailable } from './utils/preflight.js';

// The CLI module imports the SDK, so it is only loaded once the SDK resolves.
if (!isPackageAvailable(SSM_SDK_PACKAGE)) {
  console.error(chalk.red(`❌ ${SSM_SDK_PACKAGE} is not installed. This tool cannot function without it.`));
  console.error(chalk.yellow(`💡 Run: npm install ${SSM_SDK_PACKAGE}`));
  process.exit(ExitCode.MissingDependency);
} else {
  import('./cli.js')
    .then(({ main }) => main(process.argv))
    .catch((error: unknown) => {
      console.error(chalk.red('❌ Unexpected error:'));
      console.error(chalk.red(describeError(error)));
      process.exit(ExitCode.Failure);
    });
}

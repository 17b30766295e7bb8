/**
 * GitHub Actions entry point
 */

import { ExitCodes } from '@pipevars/engine';
import { ActionHost } from './host/ActionHost.js';

ActionHost.run()
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = ExitCodes.INTERNAL_ERROR;
  });

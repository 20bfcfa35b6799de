import { run } from './main';
import { printError } from './ui/output';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    printError(err instanceof Error ? err.message : 'Unexpected error');
    process.exitCode = 1;
  });

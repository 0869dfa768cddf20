/**
 * Run: npm run cli -- <command> [options]
 */
import './load-env';

import { main } from '../lib/cli';

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    console.error(err);
    process.exit(1);
  });

import 'dotenv/config';

import { runCli } from './cli.js';

// configuration is read from process.env inside runCli, so a bad value gets an exit code
runCli(
  process.argv.slice(2),
  {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  },
  {},
)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('[nn-tour] fatal error', err);
    process.exitCode = 1;
  });

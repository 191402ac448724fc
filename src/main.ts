import { run } from './cli';

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Error:', error);
    process.exitCode = 1;
  });

import 'dotenv/config';
import { main, processIo } from './main';

const controller = new AbortController();
process.once('SIGINT', () => controller.abort());

main(process.argv.slice(2), { ...processIo(), signal: controller.signal })
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });

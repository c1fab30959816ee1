import fs from 'node:fs';
import pino from 'pino';
import { runCli } from './cli';
import { LoggerService, createLogger } from './common/logger.service';

process.exitCode = runCli(process.argv.slice(2), {
  readFile: (path) => fs.readFileSync(path, 'utf8'),
  writeFile: (path, content) => fs.writeFileSync(path, content, 'utf8'),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  logger: new LoggerService(createLogger(pino.destination(2))),
  now: () => new Date(),
});

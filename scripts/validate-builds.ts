#!/usr/bin/env node
import fs from 'fs';
import { loadConfig } from '../lib/config';
import { BuildValidatorError, ErrorCode } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { runValidation } from '../lib/validator';

const STDIN_FD = 0;

export interface CliIo {
  readStdin: () => string;
  stdout: (text: string) => void;
  stderr: (line: string) => void;
}

const processIo: CliIo = {
  readStdin: () => fs.readFileSync(STDIN_FD, 'utf-8'),
  stdout: text => process.stdout.write(text),
  stderr: line => console.error(line)
};

const readInput = (inputPath: string | undefined, io: CliIo) => {
  if (inputPath === undefined) return io.readStdin();
  if (!fs.existsSync(inputPath)) {
    throw new BuildValidatorError(`Input file not found: ${inputPath}`, ErrorCode.IO_FILE_NOT_FOUND, {
      path: inputPath
    });
  }
  try {
    return fs.readFileSync(inputPath, 'utf-8');
  } catch (err) {
    throw BuildValidatorError.fromError(err, ErrorCode.IO_READ_FAILED);
  }
};

/**
 * `args` are the positional arguments after the script name. Returns the exit status;
 * the report is the only thing written to stdout.
 */
export function main(args: string[], env: NodeJS.ProcessEnv = process.env, io: CliIo = processIo): number {
  try {
    const config = loadConfig(env);
    const logger = createLogger(config.logLevel, {}, io.stderr);
    const [inputPath] = args;
    logger.debug('Reading input', { source: inputPath ?? 'stdin' });
    io.stdout(`${runValidation(readInput(inputPath, io), { logger })}\n`);
    return 0;
  } catch (err) {
    const error = BuildValidatorError.fromError(err);
    createLogger('error', {}, io.stderr).error(error.message, { code: error.code, ...error.context });
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}

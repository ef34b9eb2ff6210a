/**
 * Interactive password prompt utility.
 * Reads the password from ASKDB_PASSWORD or prompts on stderr without echo.
 */

import { createInterface } from 'node:readline';
import { Writable } from 'node:stream';

export function getPassword(env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const envPw = env.ASKDB_PASSWORD;
  if (envPw) {
    return Promise.resolve(envPw);
  }

  return new Promise((resolve, reject) => {
    let muted = false;
    // Typed characters go through this stream and are dropped while muted
    const sink = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        if (!muted) process.stderr.write(chunk);
        callback();
      },
    });

    const rl = createInterface({ input: process.stdin, output: sink, terminal: true });
    process.stderr.write('Password: ');
    muted = true;

    rl.question('', (answer) => {
      muted = false;
      process.stderr.write('\n');
      rl.close();
      resolve(answer);
    });

    rl.on('error', reject);
  });
}

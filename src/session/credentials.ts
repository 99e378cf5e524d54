// ============================================================================
// CREDENTIALS: from config/env, prompting on a terminal for what is missing
// ============================================================================

import readline from "readline";
import { Writable } from "stream";
import { AuthError } from "../errors";
import type { Credentials, CredentialsProvider } from "./types";

interface PartialCredentials {
  username: string | null;
  password: string | null;
}

function complete(partial: PartialCredentials): Credentials {
  if (!partial.username || !partial.password) {
    throw new AuthError("Credentials are required to log in automatically.");
  }
  return { username: partial.username, password: partial.password };
}

/** Use only what configuration supplied; missing values are an AuthError. */
export function staticCredentials(partial: PartialCredentials): CredentialsProvider {
  return async () => complete(partial);
}

export type Ask = (question: string, secret: boolean) => Promise<string>;

/** readline question; with `secret` the typed characters are not echoed. */
export const askOnTerminal: Ask = (question, secret) => {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) process.stdout.write(chunk);
      callback();
    },
  });
  const rl = readline.createInterface({ input: process.stdin, output, terminal: true });

  return new Promise<string>((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      if (secret) process.stdout.write("\n");
      resolve(answer);
    });
    muted = secret;
  });
};

/**
 * Prompt for whatever configuration left out. Without a TTY nothing can be
 * asked, so missing credentials are an AuthError.
 */
export function promptingCredentials(
  partial: PartialCredentials,
  ask: Ask = askOnTerminal,
  interactive: boolean = process.stdin.isTTY === true
): CredentialsProvider {
  return async () => {
    if (!interactive) return complete(partial);

    const username = partial.username || (await ask("Username or email: ", false)).trim();
    const password = partial.password || (await ask("Password: ", true));
    return complete({ username, password });
  };
}

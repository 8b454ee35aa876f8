import type { Environment, FetchLike, MailTransport, Sleep } from "@stockrecon/connectors";

/**
 * Process boundary handed to every command. `main` fills it from the real
 * process; tests substitute stubs.
 */
export interface CommandContext {
  env: Environment;
  /** Writes one block of user-facing output. */
  print: (text: string) => void;
  fetch?: FetchLike | undefined;
  sleep?: Sleep | undefined;
  mailTransport?: MailTransport | undefined;
  now?: (() => Date) | undefined;
}

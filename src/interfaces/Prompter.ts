/**
 * Source of operator answers for interactive steps.
 *
 * Both methods resolve with the trimmed answer, or an empty string when no
 * interactive input is available.
 */
export interface Prompter {
  ask(question: string): Promise<string>;

  /** Ask without echoing the typed characters */
  askSecret(question: string): Promise<string>;

  close(): void;
}

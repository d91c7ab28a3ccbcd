/**
 * Blocking user interaction used by the confirmation gate and the
 * project selection step. Both calls wait until the user answers.
 */
export interface Prompter {
  /**
   * Ask the user to approve running an action
   * @returns true only on an explicit "proceed"; dismissal means false
   */
  confirm(message: string): Promise<boolean>;

  /**
   * Ask the user to pick one of the candidates
   * @returns the chosen candidate, or null when cancelled
   */
  choose(title: string, candidates: string[]): Promise<string | null>;
}

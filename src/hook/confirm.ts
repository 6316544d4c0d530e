export interface Prompter {
  question(query: string): Promise<string>;
}

export const CONFIRM_QUESTION = "Proceed with commit anyway? (y/N): ";

export async function confirmProceed(prompter: Prompter): Promise<boolean> {
  const answer = (await prompter.question(CONFIRM_QUESTION)).trim().toLowerCase();
  return answer === "y" || answer === "yes";
}

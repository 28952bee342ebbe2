/**
 * Interactive prompts. The CLI uses the clack-backed implementation;
 * tests and non-interactive runs use a fixed answer.
 */
import * as clack from "@clack/prompts";
import { SetupError, SetupErrorCode } from "./shared/errors.js";

export interface PromptPort {
  confirm(message: string, initial?: boolean): Promise<boolean>;
}

export function createClackPrompt(): PromptPort {
  return {
    async confirm(message: string, initial?: boolean): Promise<boolean> {
      const result = await clack.confirm({ message, initialValue: initial ?? false });
      if (clack.isCancel(result)) {
        clack.cancel("Setup cancelled.");
        throw new SetupError(SetupErrorCode.USER_CANCELLED, "Setup cancelled by user");
      }
      return result;
    },
  };
}

/** Answers every question with the same value. */
export function createFixedPrompt(answer: boolean): PromptPort {
  return {
    async confirm(): Promise<boolean> {
      return answer;
    },
  };
}

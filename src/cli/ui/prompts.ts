/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";
import type { OperatorPrompts } from "../../types";

export const confirm = p.confirm;
export const select = p.select;
export const text = p.text;
export const multiselect = p.multiselect;
export const isCancel = p.isCancel;

function overwriteQuestion(archiveName: string): string {
  return `Archive ${archiveName} already exists. Overwrite it?`;
}

/**
 * Operator prompts answered in the terminal. Cancelling counts as declining.
 */
export class ClackPrompts implements OperatorPrompts {
  async confirm(message: string, initialValue: boolean = false): Promise<boolean> {
    const answer = await p.confirm({ message, initialValue });
    return !p.isCancel(answer) && answer;
  }

  async confirmOverwrite(archiveName: string): Promise<boolean> {
    return this.confirm(overwriteQuestion(archiveName), false);
  }

  async askPath(message: string, defaultValue: string): Promise<string | null> {
    const answer = await p.text({ message, placeholder: defaultValue, defaultValue });
    if (p.isCancel(answer)) return null;
    return answer.trim() || defaultValue;
  }
}

/**
 * Answers yes and accepts every suggested path (--yes). Existing archives
 * are never replaced; the new one gets a suffix.
 */
export class AutoApprovePrompts implements OperatorPrompts {
  async confirm(message: string): Promise<boolean> {
    p.log.info(`${message} yes (--yes)`);
    return true;
  }

  async confirmOverwrite(archiveName: string): Promise<boolean> {
    p.log.info(`${overwriteQuestion(archiveName)} no (--yes keeps existing archives)`);
    return false;
  }

  async askPath(message: string, defaultValue: string): Promise<string | null> {
    p.log.info(`${message}: ${defaultValue} (--yes)`);
    return defaultValue;
  }
}

export function createPrompts(assumeYes: boolean): OperatorPrompts {
  return assumeYes ? new AutoApprovePrompts() : new ClackPrompts();
}

/**
 * Confirmation gate for rendered admin statements.
 * Medium and high risk actions require an exact typed phrase.
 */

import { maxRisk, type ConcreteAction, type RiskLevel } from '../actions/types.js';

export const SCHEMA_CHANGE_PHRASE = 'I UNDERSTAND THIS CHANGES THE SCHEMA';
export const DATA_LOSS_PHRASE = 'I ACCEPT THE RISK OF DATA LOSS';

export interface ConfirmationRequest {
  risk: RiskLevel;
  phrase: string;
  message: string;
}

/**
 * Build the confirmation request for a risk level, or null when none is needed.
 */
export function requestConfirmation(risk: RiskLevel, customPhrase?: string | null): ConfirmationRequest | null {
  if (risk === 'high') {
    return {
      risk,
      phrase: DATA_LOSS_PHRASE,
      message:
        'This operation may cause irreversible data loss. ' +
        `Type the following phrase exactly to confirm:\n\n  ${DATA_LOSS_PHRASE}`,
    };
  }

  if (risk === 'medium') {
    const phrase = customPhrase || SCHEMA_CHANGE_PHRASE;
    return {
      risk,
      phrase,
      message: `This operation changes the schema. Type the following phrase exactly to confirm:\n\n  ${phrase}`,
    };
  }

  return null;
}

/** One confirmation covering a batch of actions, at the highest risk among them. */
export function requestBatchConfirmation(
  actions: readonly ConcreteAction[],
  customPhrase?: string | null,
): ConfirmationRequest | null {
  return requestConfirmation(maxRisk(actions.map((a) => a.risk)), customPhrase);
}

/**
 * Exact match required (trimmed, case-sensitive).
 */
export function verifyConfirmation(input: string, expectedPhrase: string): boolean {
  return input.trim() === expectedPhrase;
}

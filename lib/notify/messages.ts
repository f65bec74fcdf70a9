/**
 * Subjects and bodies of the recommendation emails.
 */

import type { GenerationErrorKind } from "@/lib/errors";

export interface MessageContent {
  subject: string;
  body: string;
}

const SUBJECT_PREFIX = "New data successfully processed";

export function noResultsMessage(): MessageContent {
  return {
    subject: `${SUBJECT_PREFIX}: No suitable vacation spots found.`,
    body: "The query did not return any results. Consider adjusting your filters.",
  };
}

export function successMessage(plan: string): MessageContent {
  return {
    subject: `${SUBJECT_PREFIX}: The perfect place for your summer vacation has been found.`,
    body: plan,
  };
}

const DEGRADED_DETAIL: Record<GenerationErrorKind, string> = {
  unavailable: "It appears that the text generation model is not available in your region or workspace.",
  timeout: "The text generation model did not answer in time.",
  rate_limited: "The text generation model is currently rate limited.",
  empty_response: "The text generation model returned an empty answer.",
  failed: "The text generation call failed.",
};

/**
 * Sent when generation fails; lists the qualifying destinations so the
 * refresh still produces something useful.
 */
export function degradedMessage(kind: GenerationErrorKind, destinationsJson: string): MessageContent {
  return {
    subject: `${SUBJECT_PREFIX}: Vacation plan generation unavailable.`,
    body: `${DEGRADED_DETAIL[kind]}\n\nQualifying destinations:\n${destinationsJson}`,
  };
}

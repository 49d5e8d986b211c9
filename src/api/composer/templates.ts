import type { ConversationState } from '../conversation/types.ts';

/** Sent for a manual or keyword opt-out. Exact text is part of the carrier-facing contract. */
export const OPT_OUT_CONFIRMATION = 'Messages Stopped';

/** Deterministic replies used when generation fails. */
export const STATE_TEMPLATES: Readonly<Record<ConversationState, string>> = {
  start: 'Hey! Quick check-in: are you still seeing any pest activity?',
  interested: 'Great! Roughly how many square feet is the area you want serviced?',
  action_sqft: 'Please let me know the square footage of your property.',
  follow_up: "Thanks, I've noted those details. We will reach out with a booking.",
  pause: "Let's pause for now. Text us whenever you're ready to pick this back up.",
  done: 'All set, thanks! We will reach out if anything is needed.',
  stop: OPT_OUT_CONFIRMATION,
};

export function templateForState(state: ConversationState): string {
  return STATE_TEMPLATES[state];
}

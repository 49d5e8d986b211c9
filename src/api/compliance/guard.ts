/**
 * Opt-out detection and contactability rules.
 */

import { isTerminalState, type Contact } from '../conversation/types.ts';

export interface ComplianceVerdict {
  isOptOut: boolean;
  /** Always false for inbound text: re-enrollment is an operator action only. */
  isOptIn: boolean;
}

export class ComplianceGuard {
  private readonly keywords: ReadonlySet<string>;

  constructor(keywords: readonly string[]) {
    this.keywords = new Set(keywords.map((k) => k.trim().toUpperCase()));
  }

  /**
   * Whole-message match after trimming, case-insensitive.
   * "STOP" opts out; "please stop" does not.
   */
  evaluate(_contact: Contact, inboundText: string): ComplianceVerdict {
    return {
      isOptOut: this.keywords.has(inboundText.trim().toUpperCase()),
      isOptIn: false,
    };
  }

  /** Whether automated sends may target the contact. */
  isContactable(contact: Contact): boolean {
    return !isTerminalState(contact.state);
  }
}

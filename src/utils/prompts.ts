import { ActiveDomain, Domain, SessionStage } from '../types/session';

const BASE_PROMPT = `You are a friendly, professional concierge for a premium vehicle marketplace. You help customers buy a vehicle, book a service for their car, or list their car for sale.

RULES:
- Keep responses short: two or three sentences plus any list you are given
- Ask for at most the fields listed under STILL NEEDED, in that order
- Never invent vehicles, prices, providers, dates or reference numbers
- Keep every figure, list item and reference from the DRAFT REPLY exactly as written
- If the customer seems frustrated, apologise briefly and carry on

TONE: Warm, knowledgeable and discreet. Like a good personal shopper.`;

const DOMAIN_FOCUS: Record<ActiveDomain, string> = {
  none: 'The customer has not said what they need yet. Offer the three things you can help with.',
  acquisition: 'The customer is buying a vehicle: search, selection, finance and reservation.',
  service: 'The customer is booking a service: vehicle details, work needed, provider and appointment.',
  consignment: 'The customer is selling their car: vehicle details, condition, valuation and listing.',
};

export interface ReplyContext {
  domain: ActiveDomain;
  stage: SessionStage;
  missing: string[];
  draft: string;
}

export function buildSystemContext(context: ReplyContext): string {
  const parts: string[] = [BASE_PROMPT, `\nFOCUS:\n${DOMAIN_FOCUS[context.domain]}`];

  const state: string[] = [`Stage: ${context.stage}`];
  if (context.missing.length > 0) {
    state.push(`STILL NEEDED: ${context.missing.join(', ')}`);
  }
  parts.push(`\nCONVERSATION STATE:\n${state.join('\n')}`);

  parts.push(
    `\nDRAFT REPLY (rewrite it in your own words for the latest customer message, keeping all facts):\n${context.draft}`
  );

  return parts.join('\n');
}

export const CLASSIFICATION_PROMPT = `You route messages for a vehicle marketplace concierge. Classify the customer's message into exactly one word:
- acquisition: buying, finding or financing a vehicle
- service: servicing, repairing, inspecting or upgrading a vehicle they own
- consignment: selling, valuing or listing a vehicle they own
- none: anything else

Answer with the single word only.`;

const CLASSIFICATION_LABELS: (Domain | 'none')[] = ['acquisition', 'service', 'consignment', 'none'];

/** The first routing label in a classifier answer, or null when there is none. */
export function parseClassification(text: string): Domain | 'none' | null {
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  for (const word of words) {
    const label = CLASSIFICATION_LABELS.find((candidate) => candidate === word);
    if (label) return label;
  }
  return null;
}

import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import lexicon from '../data/vehicle-lexicon.json';
import domainKeywords from '../data/domain-keywords.json';
import { AwaitedField, Domain, SessionState } from '../types/session';
import {
  ConfirmationSignal,
  ContactFactSignal,
  DateTimeSignal,
  DomainHintSignal,
  FinancePreferenceSignal,
  OptionChoiceSignal,
  SaleReasonSignal,
  ServiceRequestSignal,
  Signal,
  BudgetSignal,
  VehicleFactSignal,
} from '../types/signal';
import { FinanceType } from '../types/finance';
import { DEFAULT_SERVICE_TYPE, escapeRegExp, matchServiceType, phrasePattern } from '../utils/serviceTypes';
import { logger } from '../utils/logger';

export interface ExtractionContext {
  awaiting: AwaitedField | null;
  now: Date;
}

export type Detector = (utterance: string, context: ExtractionContext) => Signal | null;

interface MakeEntry {
  name: string;
  aliases: string[];
  models: string[];
}

const MAKES: MakeEntry[] = lexicon.makes;
const COLORS: string[] = lexicon.colors;

/** Domain lexicons in routing priority order. */
const DOMAIN_LEXICON: { domain: Domain; keywords: string[] }[] = [
  { domain: 'acquisition', keywords: domainKeywords.acquisition },
  { domain: 'service', keywords: domainKeywords.service },
  { domain: 'consignment', keywords: domainKeywords.consignment },
];

const GREETINGS: string[] = domainKeywords.greetings;

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;
const PHONE_PATTERNS: RegExp[] = [/(?:\+\d|\b0)[\d\s-]{8,16}\d/g, /\b\d{10,15}\b/g];
const POSTCODE_PATTERN = /\b([A-Z]{1,2}\d{1,2}[A-Z]?)\s?(\d[A-Z]{2})\b/i;
const YEAR_PATTERN = /\b(19[5-9]\d|20\d{2})\b/g;
const MILEAGE_THOUSANDS_PATTERN = /(\d[\d,]*(?:\.\d+)?)\s*(?:k|thousand)\b(?:\s*(?:miles|mi))?/i;
const MILEAGE_PATTERN = /(\d[\d,]*)\s*(?:miles|mi|mls)\b/i;
const BARE_NUMBER_PATTERN = /^\s*(\d[\d,]*)\s*$/;
const DATE_PHRASES: RegExp[] = [
  /\b\d{1,2}(?:st|nd|rd|th)?\s+(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\.?,?\s+\d{4}\b/gi,
  /\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\.?\s+\d{1,2}(?:st|nd|rd|th)?,?\s+\d{4}\b/gi,
  /\b\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}\b/g,
];

const BUDGET_PATTERN =
  /\b(?:under|below|less than|up to|no more than|max(?:imum)?(?: of)?|budget(?: of| is)?|within)\s*£?\s*(\d[\d,]*(?:\.\d+)?)\s*(k|thousand|m|million)?\b(?!\s*(?:miles|mi|mls)\b)/gi;
const BUDGET_MULTIPLIERS: Record<string, number> = { k: 1000, thousand: 1000, m: 1000000, million: 1000000 };

const NAME_INTRO_PATTERN = /\b(?:my name is|my name's|name's|call me|this is)\s+([A-Za-z][A-Za-z'-]*(?:\s+[A-Za-z][A-Za-z'-]*)?)/i;
/** Words that never make up a name, model or colour answer on their own. */
const FILLER_WORDS = new Set([
  'hi', 'hello', 'hey', 'and', 'my', 'name', 'is', 'email', 'e-mail', 'phone', 'number', 'mobile', 'tel',
  'postcode', 'post', 'code', 'address', 'at', 'on', 'me', 'it', 'its', "it's", 'the', 'a', 'an', 'of',
  'thanks', 'thank', 'you', 'please', 'yes', 'ok', 'okay', 'sure', 'here', 'are', 'details', 'contact',
  'im', "i'm", 'i', 'call', 'this', 'reach', 'can', 'be', 'reached', 'with', 'has', 'had', 'done', 'about',
  'around', 'roughly', 'approx', 'approximately', 'miles', 'mileage', 'colour', 'color', 'model', 'car',
  'was', 'in', 'to', 'for', 'by', 'pay', 'paying', 'instead', 'we', 'our', 'your', 'so', 'just', 'like',
  'would', 'could', 'want', 'need', 'have', 'got', 'do', 'not', 'no', 'or', 'year', 'registered',
]);

const CHOICE_PATTERN = /^\s*(?:(?:number|no\.?|option|#)\s*)?(\d{1,2})(?:st|nd|rd|th)?(?:\s+(?:one|please))?\s*[.!]?\s*$/i;
const ORDINAL_WORDS: Record<string, number> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  fifth: 5,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
};
const ORDINAL_PATTERN = /^\s*(?:the\s+)?(first|second|third|fourth|fifth|one|two|three|four|five)(?:\s+one)?(?:\s+please)?\s*[.!]?\s*$/i;

const AFFIRMATIVE_PATTERN = /^\s*(?:yes|yeah|yep|yup|sure|ok|okay|correct|confirm(?:ed)?|go ahead|sounds good|perfect|that's right|please do)\b/i;
const NEGATIVE_PATTERN = /^\s*(?:no|nope|nah|not really|cancel|don't)\b/i;

const FINANCE_PATTERNS: { pattern: RegExp; financeType: FinanceType }[] = [
  { pattern: /\b(?:pcp|personal contract(?: purchase)?)\b/i, financeType: 'pcp' },
  // "700 hp" is engine power, not hire purchase
  { pattern: /\bhire purchase\b|(?<!\d\s*)\bhp\b/i, financeType: 'hp' },
  { pattern: /\b(?:lease|leasing)\b/i, financeType: 'lease' },
  { pattern: /\b(?:bespoke|balloon)\b/i, financeType: 'bespoke' },
  { pattern: /\b(?:cash|outright|pay in full|paying in full)\b/i, financeType: 'cash' },
];

/** Recognised facts, taken out before a bare answer is read as free text. */
const CONSUMED_PATTERNS: RegExp[] = [
  new RegExp(EMAIL_PATTERN.source, 'g'),
  ...PHONE_PATTERNS,
  new RegExp(POSTCODE_PATTERN.source, 'gi'),
  BUDGET_PATTERN,
  new RegExp(MILEAGE_THOUSANDS_PATTERN.source, 'gi'),
  new RegExp(MILEAGE_PATTERN.source, 'gi'),
  ...DATE_PHRASES,
  YEAR_PATTERN,
  ...FINANCE_PATTERNS.map(({ pattern }) => new RegExp(pattern.source, 'gi')),
];

const SALE_REASON_PATTERN = /\b(?:selling(?: it)?|sell(?: it)?)\s+(?:because|as|since)\s+(.+)$/i;
const LEADING_FILLER = /^(?:it's|it is|its|it was|it'?s a|a|an|the|because|cause|cos|i'm|i am|we're|we are)\s+/i;

function makePattern(alias: string): RegExp {
  return new RegExp(`(?<![\\w-])${escapeRegExp(alias)}(?![\\w-])`, 'i');
}

function parseNumber(raw: string): number {
  return Number(raw.replace(/,/g, ''));
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

function stripFiller(text: string): string {
  let result = text.trim().replace(/[.!]+$/, '');
  let previous = '';
  while (previous !== result) {
    previous = result;
    result = result.replace(LEADING_FILLER, '').trim();
  }
  return result;
}

/**
 * Words left in a bare answer once every recognised fact is taken out.
 * Null for questions and for leftovers that still carry digits.
 */
function freeTextAnswer(utterance: string, remove: RegExp[] = []): string[] | null {
  if (/\?\s*$/.test(utterance)) return null;

  let text = utterance;
  for (const pattern of [...remove, ...CONSUMED_PATTERNS]) {
    text = text.replace(pattern, ' ');
  }

  const words = text
    .split(/[\s,;:.!()]+/)
    .filter((word) => /[A-Za-z0-9]/.test(word) && !FILLER_WORDS.has(word.toLowerCase()));
  if (words.length === 0 || words.some((word) => /\d/.test(word))) return null;
  return words;
}

function isMakeWord(word: string): boolean {
  const lower = word.toLowerCase();
  return MAKES.some((make) => make.aliases.includes(lower));
}

export function findMake(utterance: string): MakeEntry | null {
  let best: { entry: MakeEntry; length: number } | null = null;
  for (const entry of MAKES) {
    for (const alias of entry.aliases) {
      if (makePattern(alias).test(utterance) && (!best || alias.length > best.length)) {
        best = { entry, length: alias.length };
      }
    }
  }
  return best?.entry ?? null;
}

export function findModel(utterance: string, make: MakeEntry | null): { make: MakeEntry; model: string } | null {
  const candidates = make ? [make] : MAKES;
  let best: { make: MakeEntry; model: string } | null = null;
  for (const entry of candidates) {
    for (const model of entry.models) {
      if (makePattern(model).test(utterance) && (!best || model.length > best.model.length)) {
        best = { make: entry, model };
      }
    }
  }
  return best;
}

export function detectYear(utterance: string, now: Date): number | undefined {
  let text = utterance;
  for (const pattern of DATE_PHRASES) {
    text = text.replace(pattern, ' ');
  }

  const maxYear = now.getFullYear() + 1;
  for (const match of text.matchAll(YEAR_PATTERN)) {
    const year = Number(match[1]);
    if (year >= 1950 && year <= maxYear) return year;
  }
  return undefined;
}

export function detectMileage(utterance: string, awaiting: AwaitedField | null): number | undefined {
  const text = utterance.replace(BUDGET_PATTERN, ' ');
  const thousands = text.match(MILEAGE_THOUSANDS_PATTERN);
  if (thousands && thousands.index !== undefined && !/[£$]$/.test(text.slice(0, thousands.index))) {
    return Math.round(parseNumber(thousands[1]) * 1000);
  }

  const miles = text.match(MILEAGE_PATTERN);
  if (miles) return parseNumber(miles[1]);

  if (awaiting === 'mileage') {
    const bare = text.match(BARE_NUMBER_PATTERN);
    if (bare) return parseNumber(bare[1]);
  }
  return undefined;
}

export function detectVehicle(utterance: string, context: ExtractionContext): VehicleFactSignal | null {
  const signal: VehicleFactSignal = { type: 'vehicle' };

  const make = findMake(utterance);
  const model = findModel(utterance, make);
  if (make) signal.make = make.name;
  if (model) {
    signal.make = model.make.name;
    signal.model = model.model;
  } else if (context.awaiting === 'model') {
    const aliases = make ? [new RegExp(make.aliases.map(escapeRegExp).join('|'), 'gi')] : [];
    const answer = freeTextAnswer(utterance, aliases)?.join(' ');
    if (answer && answer.length <= 40) signal.model = answer;
  }

  if (context.awaiting !== 'choice') {
    const year = detectYear(utterance, context.now);
    if (year !== undefined) signal.year = year;

    const mileage = detectMileage(utterance, context.awaiting);
    if (mileage !== undefined) signal.mileage = mileage;
  }

  const color = COLORS.filter((candidate) => phrasePattern(candidate).test(utterance)).sort(
    (a, b) => b.length - a.length
  )[0];
  if (color) {
    signal.color = capitalize(color);
  } else if (context.awaiting === 'color') {
    const words = freeTextAnswer(utterance);
    if (words && words.length <= 3) signal.color = capitalize(words.join(' '));
  }

  return Object.keys(signal).length > 1 ? signal : null;
}

function extractPhone(utterance: string): { phone: string; raw: string } | null {
  for (const pattern of PHONE_PATTERNS) {
    for (const match of utterance.matchAll(pattern)) {
      const raw = match[0].trim();
      const digits = raw.replace(/\D/g, '');
      if (digits.length >= 10 && digits.length <= 15) {
        return { phone: raw.startsWith('+') ? `+${digits}` : digits, raw };
      }
    }
  }
  return null;
}

function nameFromWords(words: string[]): string | undefined {
  const picked = words
    .filter((word) => /^[A-Za-z][A-Za-z'-]*$/.test(word) && word.length > 1)
    .filter((word) => !FILLER_WORDS.has(word.toLowerCase()) && !isMakeWord(word))
    .slice(0, 2);
  return picked.length > 0 ? picked.map(capitalize).join(' ') : undefined;
}

export function detectContact(utterance: string, context: ExtractionContext): ContactFactSignal | null {
  const signal: ContactFactSignal = { type: 'contact' };
  let leftover = utterance;

  const email = utterance.match(EMAIL_PATTERN);
  if (email) {
    signal.email = email[0].toLowerCase();
    leftover = leftover.replace(email[0], ' ');
  }

  const phone = extractPhone(leftover);
  if (phone) {
    signal.phone = phone.phone;
    leftover = leftover.replace(phone.raw, ' ');
  }

  const postcode = leftover.match(POSTCODE_PATTERN);
  if (postcode) {
    signal.postcode = `${postcode[1]} ${postcode[2]}`.toUpperCase();
    leftover = leftover.replace(postcode[0], ' ');
  }

  const intro = leftover.match(NAME_INTRO_PATTERN);
  const words = freeTextAnswer(leftover);
  const hasContactData = Boolean(signal.email || signal.phone);
  let name: string | undefined;
  if (intro) {
    name = nameFromWords(intro[1].split(/\s+/));
  } else if (words && (context.awaiting === 'name' || (hasContactData && words.length <= 3))) {
    name = nameFromWords(words);
  }
  if (name) signal.name = name;

  return Object.keys(signal).length > 1 ? signal : null;
}

export function detectChoice(utterance: string, context: ExtractionContext): OptionChoiceSignal | null {
  if (context.awaiting !== 'choice') return null;

  const numeric = utterance.match(CHOICE_PATTERN);
  if (numeric) {
    const index = Number(numeric[1]);
    return index >= 1 ? { type: 'choice', index } : null;
  }

  const ordinal = utterance.match(ORDINAL_PATTERN);
  if (ordinal) {
    const index = ORDINAL_WORDS[ordinal[1].toLowerCase()];
    return index ? { type: 'choice', index } : null;
  }
  return null;
}

export function detectDateTime(utterance: string, context: ExtractionContext): DateTimeSignal | null {
  const results = chrono.parse(utterance, context.now, { forwardDate: true });
  const result = results.find((candidate) => candidate.start.isCertain('day') || candidate.start.isCertain('weekday'));
  if (!result) return null;

  let when = DateTime.fromJSDate(result.start.date());
  if (!result.start.isCertain('hour')) {
    when = when.set({ hour: 10, minute: 0, second: 0, millisecond: 0 });
  }

  const value = when.toISO();
  return value ? { type: 'datetime', value, text: result.text } : null;
}

export function detectConfirmation(utterance: string): ConfirmationSignal | null {
  if (AFFIRMATIVE_PATTERN.test(utterance)) return { type: 'confirmation', accepted: true };
  if (NEGATIVE_PATTERN.test(utterance)) return { type: 'confirmation', accepted: false };
  return null;
}

/** Domains whose lexicon matches, in priority order. */
export function matchDomains(utterance: string): Domain[] {
  return DOMAIN_LEXICON.filter(({ keywords }) => keywords.some((keyword) => phrasePattern(keyword).test(utterance))).map(
    ({ domain }) => domain
  );
}

export function detectDomain(utterance: string): DomainHintSignal | null {
  const [domain] = matchDomains(utterance);
  return domain ? { type: 'domain', domain } : null;
}

export function isGreeting(utterance: string): boolean {
  const normalized = utterance
    .toLowerCase()
    .replace(/[^a-z\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return GREETINGS.includes(normalized);
}

export function detectServiceRequest(utterance: string, context: ExtractionContext): ServiceRequestSignal | null {
  const description = utterance.trim();
  const match = matchServiceType(utterance);
  if (match) return { type: 'service', serviceType: match.type, description };

  if (context.awaiting === 'service_type' && description.length > 0) {
    return { type: 'service', serviceType: DEFAULT_SERVICE_TYPE, description };
  }
  return null;
}

export function detectFinancePreference(utterance: string): FinancePreferenceSignal | null {
  for (const { pattern, financeType } of FINANCE_PATTERNS) {
    if (pattern.test(utterance)) return { type: 'finance', financeType };
  }
  return null;
}

/** Upper price bound from "under £170,000", "budget 200k" or "up to £150k". */
export function detectBudget(utterance: string): BudgetSignal | null {
  for (const match of utterance.matchAll(BUDGET_PATTERN)) {
    const unit = match[2]?.toLowerCase();
    const amount = Math.round(parseNumber(match[1]) * (unit ? BUDGET_MULTIPLIERS[unit] : 1));
    if (amount >= 1000) return { type: 'budget', maxPrice: amount };
  }
  return null;
}

export function detectSaleReason(utterance: string, context: ExtractionContext): SaleReasonSignal | null {
  const explicit = utterance.match(SALE_REASON_PATTERN);
  if (explicit) return { type: 'sale_reason', reason: stripFiller(explicit[1]) };

  if (context.awaiting === 'sale_reason') {
    const reason = stripFiller(utterance);
    if (reason.length > 0) return { type: 'sale_reason', reason };
  }
  return null;
}

const DETECTORS: Detector[] = [
  detectVehicle,
  detectContact,
  detectChoice,
  detectDateTime,
  detectConfirmation,
  detectDomain,
  detectServiceRequest,
  detectFinancePreference,
  detectBudget,
  detectSaleReason,
];

export class IntentService {
  constructor(private readonly clock: () => Date = () => new Date()) {}

  /** Runs every detector and returns the union; an empty list means nothing was extracted. */
  extract(utterance: string, session: Pick<SessionState, 'awaiting' | 'sessionId'>): Signal[] {
    const context: ExtractionContext = { awaiting: session.awaiting, now: this.clock() };
    const signals: Signal[] = [];

    for (const detector of DETECTORS) {
      const signal = detector(utterance, context);
      if (signal) signals.push(signal);
    }

    logger.debug('Signals extracted', {
      sessionId: session.sessionId,
      awaiting: session.awaiting,
      types: signals.map((signal) => signal.type),
    });

    return signals;
  }
}

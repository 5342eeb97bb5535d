import { TextCompletion } from '../types/capabilities';
import { Domain, SessionState } from '../types/session';
import { findMake, findModel, isGreeting, matchDomains } from './intent.service';
import { CLASSIFICATION_PROMPT, parseClassification } from '../utils/prompts';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type RouteSource = 'sticky' | 'keyword' | 'vehicle' | 'classifier';

export type RouteDecision =
  | { kind: 'domain'; domain: Domain; source: RouteSource }
  | { kind: 'greeting' }
  | { kind: 'ambiguous' };

/**
 * Picks the funnel for a message. An unfinished funnel keeps the conversation;
 * otherwise keywords decide (acquisition over service over consignment), then a
 * named vehicle means buying, then the classifier. Never throws.
 */
export class RoutingService {
  constructor(private readonly classifier: TextCompletion | null = null) {}

  async route(utterance: string, session: Pick<SessionState, 'sessionId' | 'activeDomain' | 'slots'>): Promise<RouteDecision> {
    if (session.activeDomain !== 'none' && session.slots && !session.slots.recordCreated) {
      return { kind: 'domain', domain: session.activeDomain, source: 'sticky' };
    }

    const [keywordDomain] = matchDomains(utterance);
    if (keywordDomain) {
      logger.info('Routed by keyword', { sessionId: session.sessionId, domain: keywordDomain });
      return { kind: 'domain', domain: keywordDomain, source: 'keyword' };
    }

    if (isGreeting(utterance)) {
      return { kind: 'greeting' };
    }

    const make = findMake(utterance);
    if (make || findModel(utterance, null)) {
      logger.info('Routed by vehicle mention', { sessionId: session.sessionId, domain: 'acquisition' });
      return { kind: 'domain', domain: 'acquisition', source: 'vehicle' };
    }

    const classified = await this.classify(utterance, session.sessionId);
    if (classified) {
      logger.info('Routed by classifier', { sessionId: session.sessionId, domain: classified });
      return { kind: 'domain', domain: classified, source: 'classifier' };
    }

    logger.info('Routing ambiguous', { sessionId: session.sessionId });
    return { kind: 'ambiguous' };
  }

  /** A failed or undecided classification counts as a decline. */
  private async classify(utterance: string, sessionId: string): Promise<Domain | null> {
    if (!this.classifier) return null;

    try {
      const answer = await this.classifier.complete(CLASSIFICATION_PROMPT, [{ role: 'user', content: utterance }]);
      const label = parseClassification(answer);
      return label && label !== 'none' ? label : null;
    } catch (error) {
      logger.warn('Domain classification failed', { sessionId, error: errorMessage(error) });
      return null;
    }
  }
}

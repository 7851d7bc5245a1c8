import type { LoggerService } from '../service/logger.service';

export const BLACKLISTED_SCORE = -1;

export type MarketOffer = {
  id: string;
  /** Provider id of the offer's issuer. */
  issuer: string;
};

export interface OfferScorer {
  scoreOffer(offer: MarketOffer): Promise<number>;
}

/** Rejects offers from providers that failed an activity of this run. */
export class BlacklistOnFailure implements OfferScorer {
  private readonly blacklisted = new Set<string>();

  constructor(
    private readonly base: OfferScorer,
    private readonly logger: LoggerService,
  ) {}

  blacklist(providerId: string): void {
    this.blacklisted.add(providerId);
  }

  isBlacklisted(providerId: string): boolean {
    return this.blacklisted.has(providerId);
  }

  async scoreOffer(offer: MarketOffer): Promise<number> {
    if (this.blacklisted.has(offer.issuer)) {
      this.logger.debug(`Rejecting offer ${offer.id} from a blacklisted node '${offer.issuer}'`);
      return BLACKLISTED_SCORE;
    }
    return this.base.scoreOffer(offer);
  }
}

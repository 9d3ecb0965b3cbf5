import { RestaurantNotFoundError } from '../errors';
import { log } from '../log';
import { isWithinCallHours } from './callHours';
import { RestaurantConfig, StoredRestaurantConfigSchema, toRestaurantConfig } from './restaurantConfig';
import type { RestaurantStore } from './restaurantStore';

const E164_REGEX = /^\+[1-9]\d{1,14}$/;

export interface ResolvedRestaurant {
  config: RestaurantConfig;
  withinCallHours: boolean;
  resolvedAt: Date;
}

export interface RestaurantLookup {
  resolve(destinationNumberOrId: string): Promise<ResolvedRestaurant>;
}

export function normalizeE164(value: string): string {
  return value.trim().replace(/\s+/g, '');
}

export function isE164(value: string): boolean {
  return E164_REGEX.test(value);
}

export class RestaurantConfigResolver implements RestaurantLookup {
  private readonly store: RestaurantStore;
  private readonly now: () => Date;

  constructor(store: RestaurantStore, now: () => Date = () => new Date()) {
    this.store = store;
    this.now = now;
  }

  /**
   * Store errors propagate untouched; only lookups that positively miss or
   * carry an unusable document become {@link RestaurantNotFoundError}.
   */
  public async resolve(destinationNumberOrId: string): Promise<ResolvedRestaurant> {
    const lookup = normalizeE164(destinationNumberOrId);
    if (!lookup) {
      throw new RestaurantNotFoundError(destinationNumberOrId, 'unknown_number');
    }

    let restaurantId = lookup;
    if (isE164(lookup)) {
      const mapped = await this.store.findRestaurantIdByNumber(lookup);
      if (!mapped) {
        throw new RestaurantNotFoundError(lookup, 'unknown_number');
      }
      restaurantId = mapped;
    }

    const raw = await this.store.loadConfigDocument(restaurantId);
    if (raw === null) {
      throw new RestaurantNotFoundError(
        restaurantId,
        restaurantId === lookup ? 'unknown_restaurant' : 'config_missing',
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log.error({ err: error, restaurant_id: restaurantId }, 'restaurant config json parse failed');
      throw new RestaurantNotFoundError(restaurantId, 'config_invalid');
    }

    const result = StoredRestaurantConfigSchema.safeParse(parsed);
    if (!result.success) {
      log.error(
        { restaurant_id: restaurantId, issues: result.error.issues },
        'restaurant config invalid',
      );
      throw new RestaurantNotFoundError(restaurantId, 'config_invalid');
    }

    const config = toRestaurantConfig(result.data);
    const resolvedAt = this.now();
    return {
      config,
      withinCallHours: isWithinCallHours(config.callHours, config.timezone, resolvedAt),
      resolvedAt,
    };
  }
}

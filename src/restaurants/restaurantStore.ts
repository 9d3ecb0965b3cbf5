import { env } from '../env';
import { getRedisClient } from '../redis/client';

/** Raw config documents keyed by restaurant id, plus the number map. */
export interface RestaurantStore {
  findRestaurantIdByNumber(e164: string): Promise<string | null>;
  loadConfigDocument(restaurantId: string): Promise<string | null>;
}

export interface RedisStringReader {
  get(key: string): Promise<string | null>;
}

export function buildRestaurantMapKey(e164: string, prefix: string = env.RESTAURANTMAP_PREFIX): string {
  return `${prefix}:did:${e164}`;
}

export function buildRestaurantConfigKey(
  restaurantId: string,
  prefix: string = env.RESTAURANTCFG_PREFIX,
): string {
  return `${prefix}:${restaurantId}`;
}

export class RedisRestaurantStore implements RestaurantStore {
  private readonly redis: RedisStringReader;

  constructor(redis: RedisStringReader = getRedisClient()) {
    this.redis = redis;
  }

  public async findRestaurantIdByNumber(e164: string): Promise<string | null> {
    const restaurantId = await this.redis.get(buildRestaurantMapKey(e164));
    return restaurantId && restaurantId.trim() ? restaurantId.trim() : null;
  }

  public async loadConfigDocument(restaurantId: string): Promise<string | null> {
    return this.redis.get(buildRestaurantConfigKey(restaurantId));
  }
}

import { PlatformCatalog } from './catalog.js';
import { etsyPlatform } from './etsy.js';
import { n11Platform } from './n11.js';
import { stripePlatform } from './stripe.js';
import { trendyolPlatform } from './trendyol.js';

export function createPlatformCatalog(): PlatformCatalog {
  return new PlatformCatalog([trendyolPlatform, n11Platform, etsyPlatform, stripePlatform]);
}

import woothee from 'woothee';
import type { DeviceCategory, UserAgentClass, UserAgentClassifier } from '../../domain/index.js';

const UNKNOWN = 'UNKNOWN';

const TABLET_OS = new Set(['iPad']);
const TABLET_HINT = /tablet|ipad|kindle|silk|playbook|sm-t\d+/i;

/**
 * Maps a woothee category (plus a few tablet hints) to a device category.
 * woothee reports tablets as smartphones, so the OS and raw string decide.
 */
export function deviceCategoryOf(category: string, os: string, userAgent: string): DeviceCategory {
  switch (category) {
    case 'pc':
      return 'desktop';
    case 'smartphone':
      return TABLET_OS.has(os) || (os === 'Android' && !/mobile/i.test(userAgent)) || TABLET_HINT.test(userAgent)
        ? 'tablet'
        : 'mobile';
    case 'mobilephone':
      return 'mobile';
    case 'crawler':
      return 'bot';
    case 'appliance':
      return 'tv';
    default:
      return 'other';
  }
}

/** User-agent classification backed by woothee. Never throws. */
export class WootheeClassifier implements UserAgentClassifier {
  classify(userAgent: string): UserAgentClass {
    const result = woothee.parse(userAgent);
    const device = deviceCategoryOf(result.category, result.os, userAgent);
    return result.os && result.os !== UNKNOWN ? { device, os: result.os } : { device };
  }
}

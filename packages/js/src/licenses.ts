/**
 * Known licenses and the rights each one grants, requires or prohibits.
 *
 * Entries follow the Creative Commons REL descriptions published with the
 * 2.0 license family. Lookup is by exact URI; anything else serializes as a
 * bare license reference.
 */

import { ATTR_ABOUT, ATTR_RESOURCE } from './vocabulary.js';
import { XmlElement } from './types.js';
import { element } from './xml.js';

export const PUBLIC_DOMAIN_LABEL = 'Public Domain';
export const PUBLIC_DOMAIN_URI = 'http://web.resource.org/cc/PublicDomain';

export const CC_BY = 'http://creativecommons.org/licenses/by/2.0/';
export const CC_BY_SA = 'http://creativecommons.org/licenses/by-sa/2.0/';
export const CC_BY_ND = 'http://creativecommons.org/licenses/by-nd/2.0/';
export const CC_BY_NC = 'http://creativecommons.org/licenses/by-nc/2.0/';
export const CC_BY_NC_ND = 'http://creativecommons.org/licenses/by-nc-nd/2.0/';
export const CC_BY_NC_SA = 'http://creativecommons.org/licenses/by-nc-sa/2.0/';

type RightKind = 'permits' | 'requires' | 'prohibits';
type Right = readonly [RightKind, string];

const REPRODUCTION: Right = ['permits', 'http://web.resource.org/cc/Reproduction'];
const DISTRIBUTION: Right = ['permits', 'http://web.resource.org/cc/Distribution'];
const DERIVATIVE_WORKS: Right = ['permits', 'http://web.resource.org/cc/DerivativeWorks'];
const NOTICE: Right = ['requires', 'http://web.resource.org/cc/Notice'];
const ATTRIBUTION: Right = ['requires', 'http://web.resource.org/cc/Attribution'];
const SHARE_ALIKE: Right = ['requires', 'http://web.resource.org/cc/ShareAlike'];
const NO_COMMERCIAL_USE: Right = ['prohibits', 'http://web.resource.org/cc/CommercialUse'];

/** Rights per license URI, in the order they are written out */
export const LICENSE_RIGHTS: Readonly<Record<string, readonly Right[]>> = {
  [PUBLIC_DOMAIN_URI]: [REPRODUCTION, DISTRIBUTION, DERIVATIVE_WORKS],
  [CC_BY]: [REPRODUCTION, DISTRIBUTION, NOTICE, ATTRIBUTION, DERIVATIVE_WORKS],
  [CC_BY_SA]: [REPRODUCTION, DISTRIBUTION, NOTICE, ATTRIBUTION, DERIVATIVE_WORKS, SHARE_ALIKE],
  [CC_BY_ND]: [REPRODUCTION, DISTRIBUTION, NOTICE, ATTRIBUTION],
  [CC_BY_NC]: [REPRODUCTION, DISTRIBUTION, NOTICE, ATTRIBUTION, NO_COMMERCIAL_USE, DERIVATIVE_WORKS],
  [CC_BY_NC_ND]: [REPRODUCTION, DISTRIBUTION, NOTICE, ATTRIBUTION, NO_COMMERCIAL_USE],
  [CC_BY_NC_SA]: [
    REPRODUCTION, DISTRIBUTION, NOTICE, ATTRIBUTION, NO_COMMERCIAL_USE,
    DERIVATIVE_WORKS, SHARE_ALIKE,
  ],
};

/** Map the "Public Domain" label to its URI; other values pass through */
export function normalizeLicense(license: string): string {
  return license === PUBLIC_DOMAIN_LABEL ? PUBLIC_DOMAIN_URI : license;
}

export function isKnownLicense(license: string): boolean {
  return Object.prototype.hasOwnProperty.call(LICENSE_RIGHTS, normalizeLicense(license));
}

/**
 * The `<License>` block describing a known license, or undefined for
 * unrecognized values.
 */
export function licenseBlock(license: string): XmlElement | undefined {
  const uri = normalizeLicense(license);
  if (!isKnownLicense(uri)) return undefined;
  return element(
    'License',
    { [ATTR_ABOUT]: uri },
    LICENSE_RIGHTS[uri].map(([kind, resource]) => element(kind, { [ATTR_RESOURCE]: resource }))
  );
}

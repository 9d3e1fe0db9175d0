/**
 * URI Helpers
 *
 * Character classes and percent-encoding used by the Digital Link
 * parser and generator.
 */

const URI_CHARACTERS = /^[A-Za-z0-9\-._~:/?#[\]@!$&'()*+,;=%]*$/;
const BAD_DOMAIN_CHARACTERS = /[_~?#@!$&'()*+,;=%]/;
const UNRESERVED = /^[A-Za-z0-9\-._~]$/;

/** Convenience alphas that may stand in for an AI in the path info */
export const CONVENIENCE_ALPHAS: Readonly<Record<string, string>> = {
  cpid: '8010',
  cpsn: '8011',
  cpv: '22',
  gcn: '255',
  gdti: '253',
  giai: '8004',
  ginc: '401',
  gln: '414',
  glnx: '254',
  gmn: '8013',
  grai: '8003',
  gsin: '402',
  gsrn: '8018',
  gsrnp: '8017',
  gtin: '01',
  itip: '8006',
  lot: '10',
  party: '417',
  refno: '8020',
  ser: '21',
  srin: '8019',
  sscc: '00',
};

export function aiFromConvenienceAlpha(alpha: string): string | undefined {
  return Object.hasOwn(CONVENIENCE_ALPHAS, alpha) ? CONVENIENCE_ALPHAS[alpha] : undefined;
}

export function hasOnlyURICharacters(uri: string): boolean {
  return URI_CHARACTERS.test(uri);
}

export function hasBadDomainCharacter(domain: string): boolean {
  return BAD_DOMAIN_CHARACTERS.test(domain);
}

function hexNibble(c: string | undefined): number {
  return c !== undefined && /^[0-9A-Fa-f]$/.test(c) ? parseInt(c, 16) : -1;
}

/**
 * Reverse percent-encoding. A "%" not followed by two hex digits is kept
 * literally and "+" means space only within a query component. Returns
 * null when the decoded value contains a NUL.
 */
export function uriUnescape(input: string, isQueryComponent: boolean): string | null {
  const bytes: number[] = [];

  for (let i = 0; i < input.length; i++) {
    const c = input[i];
    if (c === '%' && i < input.length - 2) {
      const hi = hexNibble(input[i + 1]);
      const lo = hexNibble(input[i + 2]);
      if (hi !== -1 && lo !== -1) {
        const byte = (hi << 4) | lo;
        if (byte === 0) {
          return null;
        }
        bytes.push(byte);
        i += 2;
        continue;
      }
    }
    bytes.push(isQueryComponent && c === '+' ? 0x20 : c.charCodeAt(0));
  }

  return Buffer.from(bytes).toString('utf-8');
}

/**
 * Percent-encode everything but the unreserved characters. Within a query
 * component a space is written as "+".
 */
export function uriEscape(input: string, isQueryComponent: boolean): string {
  let out = '';
  for (const byte of Buffer.from(input, 'utf-8')) {
    const c = String.fromCharCode(byte);
    if (UNRESERVED.test(c)) {
      out += c;
    } else if (isQueryComponent && c === ' ') {
      out += '+';
    } else {
      out += '%' + byte.toString(16).toUpperCase().padStart(2, '0');
    }
  }
  return out;
}

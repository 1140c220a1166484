import { readFileSync } from 'node:fs';
import { Cookie as ToughCookie, type CookieJar } from 'tough-cookie';

/**
 * A parsed cookie from a Netscape-format cookie file.
 */
export interface Cookie {
  domain: string;
  includeSubdomains: boolean;
  path: string;
  secure: boolean;
  expiry: number;
  name: string;
  value: string;
}

/**
 * Load cookies from a Netscape-format cookie file, as exported by browser
 * extensions and `curl -c`. Lets a logged-in browser session stand in for
 * the login form.
 *
 * Format: domain\tTRUE\tpath\tTRUE\texpiry\tname\tvalue
 * Lines starting with '#' or blank lines are ignored, except the
 * `#HttpOnly_` prefix curl writes for HttpOnly cookies.
 *
 * @param filePath - Path to the cookie file
 * @returns Array of parsed cookies
 */
export function loadCookieFile(filePath: string): Cookie[] {
  const content = readFileSync(filePath, 'utf-8');
  const cookies: Cookie[] = [];

  for (const line of content.split('\n')) {
    let trimmed = line.trim();

    if (trimmed.startsWith('#HttpOnly_')) {
      trimmed = trimmed.substring('#HttpOnly_'.length);
    }

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#')) {
      continue;
    }

    const fields = trimmed.split('\t');
    if (fields.length < 7) {
      continue;
    }

    const [domain, includeSubdomains, path, secure, expiry, name, value] = fields;
    cookies.push({
      domain,
      includeSubdomains: includeSubdomains.toUpperCase() === 'TRUE',
      path,
      secure: secure.toUpperCase() === 'TRUE',
      expiry: parseInt(expiry, 10) || 0,
      name,
      value,
    });
  }

  return cookies;
}

/**
 * Add Netscape-format cookies to a tough-cookie jar. Expired cookies are
 * dropped; an expiry of 0 marks a session cookie.
 *
 * @param jar - The jar to seed
 * @param cookies - Parsed cookies from loadCookieFile
 * @returns The number of cookies added
 */
export async function seedCookieJar(jar: CookieJar, cookies: Cookie[]): Promise<number> {
  const now = Math.floor(Date.now() / 1000);
  let added = 0;

  for (const cookie of cookies) {
    if (cookie.expiry !== 0 && cookie.expiry < now) {
      continue;
    }

    const host = cookie.domain.startsWith('.')
      ? cookie.domain.substring(1)
      : cookie.domain;

    const tough = new ToughCookie({
      key: cookie.name,
      value: cookie.value,
      domain: host,
      path: cookie.path,
      secure: cookie.secure,
      hostOnly: !cookie.includeSubdomains,
      expires: cookie.expiry === 0 ? 'Infinity' : new Date(cookie.expiry * 1000),
    });

    const origin = `${cookie.secure ? 'https' : 'http'}://${host}${cookie.path}`;
    await jar.setCookie(tough, origin);
    added++;
  }

  return added;
}

/**
 * Endpoint key derivation for quota bucketing.
 *
 * The key is the last two path segments of the request URL, so
 * `https://host/api/v2/email/send?x=1` and `https://host/other/email/send/`
 * both map to `email/send` and share one quota bucket. That coarse-graining
 * matches how quota is observed from the server and is kept on purpose.
 */

/** Derive the quota bucket key for a request URL. */
export function endpointKey(url: string): string {
  const withoutQuery = url.replace(/[?#].*$/, '');
  const base = withoutQuery.replace(/\/+$/, '');
  return base.split('/').slice(-2).join('/');
}

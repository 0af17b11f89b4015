/**
 * Derives the caller's IP the way the ingestion endpoints see it:
 * the first entry of `x-forwarded-for`, else the socket peer address.
 */
export function resolveClientIp(
  forwardedFor: string | string[] | undefined,
  peerAddress: string | undefined,
): string | undefined {
  const header = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
  const first = header?.split(',')[0]?.trim();
  if (first) {
    return first;
  }
  return peerAddress || undefined;
}

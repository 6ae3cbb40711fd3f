import { isIP } from "net";
import { toASCII, toUnicode } from "punycode/";
import psl from "psl";

/**
 * Normalize a hostname for public-suffix lookup: trimmed, lowercase, ASCII
 * (punycode), without a trailing dot or a leading `*.` wildcard label.
 * Certificate SANs carry wildcards; PAPI hostnames occasionally carry the dot.
 */
export function normalizeHostname(input: string): string {
  const host = input.trim().toLowerCase().replace(/\.+$/, "").replace(/^\*\./, "");
  try {
    return toASCII(host);
  } catch {
    return host; // not convertible; psl rejects it below
  }
}

export function isIpLiteral(host: string): boolean {
  return isIP(host.replace(/^\[(.*)\]$/, "$1")) !== 0;
}

/**
 * Registrable (apex) domain of a hostname using the public suffix list:
 * `www.example.co.uk` -> `example.co.uk`. IP literals, single labels, bare
 * public suffixes and names under an unlisted TLD are their own apex. The
 * apex keeps the hostname's encoding: Unicode in, Unicode out.
 */
export function apexOf(hostname: string): string {
  const host = normalizeHostname(hostname);
  if (!host || isIpLiteral(host)) return hostname;
  const parsed = psl.parse(host);
  if ("error" in parsed || !parsed.listed || !parsed.domain) return hostname;
  return /[^\x00-\x7f]/.test(hostname) ? toUnicode(parsed.domain) : parsed.domain;
}

import type { BehaviorOptions, ParsedRules } from './types';
import { isRecord, JsonObject } from './sources/envelope';

const REDIRECT_BEHAVIORS = new Set(['redirect', 'responseCode']);
const HEADER_BEHAVIORS = new Set(['modifyOutgoingResponseHeader', 'modifyOutgoingRequestHeader']);
const HSTS_BEHAVIORS = new Set(['hsts', 'httpStrictTransportSecurity', 'setHsts']);

/**
 * Every node of a rule tree, root included, each exactly once.
 * Iterative DFS: children are pushed in order and popped LIFO, so sibling
 * order is not preserved. Parent links are not followed, so a tree cannot
 * revisit a node; a cyclic `children` graph would not terminate.
 */
export function flattenRules(root: JsonObject): JsonObject[] {
  const nodes: JsonObject[] = [];
  const stack: JsonObject[] = [root];
  while (stack.length) {
    const current = stack.pop();
    if (!current) break;
    nodes.push(current);
    const children = Array.isArray(current.children) ? current.children : [];
    for (const child of children) {
      if (isRecord(child)) stack.push(child);
    }
  }
  return nodes;
}

/**
 * HSTS is either a dedicated behavior, or a generic response-header setter
 * targeting Strict-Transport-Security. The header-name test applies to
 * `setResponseHeader` only; the dedicated behaviors match on name alone.
 */
export function isHstsBehavior(name: string, options: BehaviorOptions): boolean {
  if (HSTS_BEHAVIORS.has(name)) return true;
  const headerName = typeof options.headerName === 'string' ? options.headerName : '';
  return name === 'setResponseHeader' && headerName.toLowerCase() === 'strict-transport-security';
}

export function emptyParsedRules(): ParsedRules {
  return { cache: [], redirects: [], headers: [], hsts: [] };
}

/**
 * Bucket every behavior of the tree into caching, redirects, header rewrites
 * and HSTS. Behaviors matching none of them are dropped.
 */
export function parseBehaviors(root: JsonObject): ParsedRules {
  const parsed = emptyParsedRules();
  for (const node of flattenRules(root)) {
    const behaviors = Array.isArray(node.behaviors) ? node.behaviors : [];
    for (const behavior of behaviors) {
      if (!isRecord(behavior) || typeof behavior.name !== 'string') continue;
      const name = behavior.name;
      const options: BehaviorOptions = isRecord(behavior.options) ? behavior.options : {};

      if (name === 'caching') {
        parsed.cache.push(options);
      } else if (REDIRECT_BEHAVIORS.has(name) && Object.keys(options).length > 0) {
        parsed.redirects.push(options);
      } else if (HEADER_BEHAVIORS.has(name)) {
        parsed.headers.push({ directive: name, ...options });
      } else if (isHstsBehavior(name, options)) {
        parsed.hsts.push(options);
      }
    }
  }
  return parsed;
}

export function rulesKey(propertyId: string, version: number): string {
  return `${propertyId}:${version}`;
}

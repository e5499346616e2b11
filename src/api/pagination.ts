import { warn } from "../utils/log.js";
import type { Page } from "./schemas.js";

/**
 * Follows `nextToken` until the server stops returning one. A token the
 * server has already handed out ends the walk instead of looping forever.
 */
export async function collectPages<T>(
  fetchPage: (nextToken: string | undefined) => Promise<Page<T>>
): Promise<T[]> {
  const records: T[] = [];
  const seen = new Set<string>();
  let nextToken: string | undefined;
  for (;;) {
    const page = await fetchPage(nextToken);
    records.push(...page.records);
    if (page.nextToken === null) {
      return records;
    }
    if (seen.has(page.nextToken)) {
      warn(`Server repeated page token ${page.nextToken}; stopping.`);
      return records;
    }
    seen.add(page.nextToken);
    nextToken = page.nextToken;
  }
}

import { fold } from "./posting.js";
import type { Config, Posting } from "./types.js";

type KeywordConfig = Pick<Config, "keywords_include" | "keywords_exclude">;

export function matchesFilters(posting: Posting, config: KeywordConfig): boolean {
  const searchText = fold(`${posting.title} ${posting.site}`);

  // Check exclude list first - reject if ANY exclude keyword matches
  for (const keyword of config.keywords_exclude) {
    if (searchText.includes(fold(keyword))) {
      return false;
    }
  }

  // If include list is empty, match all (that passed exclude)
  if (config.keywords_include.length === 0) {
    return true;
  }

  return config.keywords_include.some((keyword) => searchText.includes(fold(keyword)));
}

export function filterPostings(postings: Posting[], config: KeywordConfig): Posting[] {
  return postings.filter((posting) => matchesFilters(posting, config));
}

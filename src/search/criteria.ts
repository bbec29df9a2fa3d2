/**
 * Listing query parameter parsing.
 *
 * Unknown `search_type` and `sort_by` values fall back to their defaults
 * silently.  Malformed `q` and `tags` values are reported as field errors
 * and dropped, so the listing still runs without them.  Values of typed
 * filters (`author`, the publication years, `page`, `page_size`) that
 * cannot be parsed raise {@link InvalidFilterValueError}.
 */

import { z } from "zod";
import { InvalidFilterValueError } from "../errors";
import { characterCount, type FormErrors } from "../forms";
import { parseTagList, validateTagList } from "../tags";
import { isUuid } from "../uuid";
import { parseInteger } from "./builder";
import {
  type ListCriteria,
  type PageRequest,
  SEARCH_MODES,
  SORT_KEYS,
} from "./types";

export const MIN_QUERY_LENGTH = 2;
export const MAX_QUERY_LENGTH = 200;
export const MAX_FILTER_TAGS = 10;
export const MAX_PAGE_SIZE = 50;

const searchMode = z.enum(SEARCH_MODES).catch("all");
const sortKey = z.enum(SORT_KEYS).catch("newest");

export type ListingParams = Record<string, string | undefined>;

export interface ParsedListing {
  criteria: ListCriteria;
  page: PageRequest;
  errors: FormErrors;
}

export function parseListingParams(
  params: ListingParams,
  defaultPageSize: number,
): ParsedListing {
  const errors: FormErrors = {};

  let query = params["q"]?.trim() ?? "";
  const queryLength = characterCount(query);
  if (
    query !== "" &&
    (queryLength < MIN_QUERY_LENGTH || queryLength > MAX_QUERY_LENGTH)
  ) {
    errors["q"] = [
      `Search query must be between ${MIN_QUERY_LENGTH} and ${MAX_QUERY_LENGTH} characters.`,
    ];
    query = "";
  }

  let tags = parseTagList(params["tags"]);
  const tagError = validateTagList(tags, MAX_FILTER_TAGS);
  if (tagError != null) {
    errors["tags"] = [tagError];
    tags = [];
  }

  const rawAuthor = params["author"]?.trim();
  let authorId: ListCriteria["authorId"];
  if (rawAuthor != null && rawAuthor !== "") {
    if (!isUuid(rawAuthor)) {
      throw new InvalidFilterValueError(
        "author",
        rawAuthor,
        "expected an author id",
      );
    }
    authorId = rawAuthor;
  }
  const authorName = params["author_name"]?.trim();

  const criteria: ListCriteria = {
    query,
    mode: searchMode.parse(params["search_type"]?.trim().toLowerCase()),
    tags,
    sort: sortKey.parse(params["sort_by"]?.trim().toLowerCase()),
    authorId,
    authorName: authorName === "" ? undefined : authorName,
    year: {
      exact: parseInteger("publication_year", params["publication_year"]),
      min: parseInteger("publication_year_min", params["publication_year_min"]),
      max: parseInteger("publication_year_max", params["publication_year_max"]),
    },
  };

  const page = parseInteger("page", params["page"]) ?? 1;
  const pageSize = parseInteger("page_size", params["page_size"]);
  return {
    criteria,
    page: {
      page: Math.max(1, page),
      pageSize:
        pageSize == null
          ? defaultPageSize
          : Math.min(MAX_PAGE_SIZE, Math.max(1, pageSize)),
    },
    errors,
  };
}

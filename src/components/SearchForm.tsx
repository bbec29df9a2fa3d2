import type { FormErrors } from "../forms";
import type { ListCriteria, SearchMode, SortKey } from "../search";
import { FieldError, invalid } from "./FormErrors";

const SEARCH_MODE_LABELS: Record<SearchMode, string> = {
  all: "Everything",
  title: "Title",
  content: "Content",
  tags: "Tags",
  author: "Author",
};

const SORT_KEY_LABELS: Record<SortKey, string> = {
  newest: "Newest first",
  oldest: "Oldest first",
  title_asc: "Title (A-Z)",
  title_desc: "Title (Z-A)",
};

export interface SearchFormProps {
  action: string;
  criteria: ListCriteria;
  errors?: FormErrors;
}

export function SearchForm({ action, criteria, errors }: SearchFormProps) {
  return (
    <form method="get" action={action} role="search">
      <fieldset role="group">
        <input
          type="search"
          name="q"
          value={criteria.query}
          placeholder="Search posts"
          aria-invalid={invalid(errors, "q")}
        />
        <select name="search_type" aria-label="Search in">
          {Object.entries(SEARCH_MODE_LABELS).map(([mode, label]) => (
            <option value={mode} selected={mode === criteria.mode}>
              {label}
            </option>
          ))}
        </select>
        <select name="sort_by" aria-label="Sort by">
          {Object.entries(SORT_KEY_LABELS).map(([key, label]) => (
            <option value={key} selected={key === criteria.sort}>
              {label}
            </option>
          ))}
        </select>
        <button type="submit">Search</button>
      </fieldset>
      <FieldError errors={errors} field="q" />
      <input
        type="text"
        name="tags"
        value={criteria.tags.join(", ")}
        placeholder="Tags, separated by commas"
        aria-invalid={invalid(errors, "tags")}
      />
      <FieldError errors={errors} field="tags" />
    </form>
  );
}

import { pageUrl, type PageInfo } from "../search";

export interface PaginationProps {
  url: string;
  info: PageInfo;
}

export function Pagination({ url, info }: PaginationProps) {
  if (info.totalPages < 2 && !info.hasPrevious) return null;
  return (
    <nav aria-label="Pagination">
      <ul>
        {info.hasPrevious && (
          <li>
            <a href={pageUrl(url, info.page - 1)} rel="prev">
              ← Previous
            </a>
          </li>
        )}
      </ul>
      <ul>
        <li>
          Page {info.page} of {info.totalPages}
        </li>
      </ul>
      <ul>
        {info.hasNext && (
          <li>
            <a href={pageUrl(url, info.page + 1)} rel="next">
              Next →
            </a>
          </li>
        )}
      </ul>
    </nav>
  );
}

import type { PropsWithChildren } from "hono/jsx";
import type { User } from "../schema";

export interface LayoutProps {
  title: string;
  user: User | null;
}

export function Layout({
  title,
  user,
  children,
}: PropsWithChildren<LayoutProps>) {
  return (
    <html lang="en">
      <head>
        <meta charset="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        <title>{title}</title>
        <link
          rel="stylesheet"
          href="https://cdn.jsdelivr.net/npm/@picocss/pico@2/css/pico.min.css"
        />
      </head>
      <body>
        <header class="container">
          <nav>
            <ul>
              <li>
                <a href="/">
                  <strong>Penpost</strong>
                </a>
              </li>
            </ul>
            <ul>
              <li>
                <a href="/posts">Posts</a>
              </li>
              {user == null ? (
                <>
                  <li>
                    <a href="/login">Log in</a>
                  </li>
                  <li>
                    <a href="/register">Register</a>
                  </li>
                </>
              ) : (
                <>
                  <li>
                    <a href="/post/new">New post</a>
                  </li>
                  <li>
                    <a href="/profile">{user.username}</a>
                  </li>
                  <li>
                    <form method="post" action="/logout">
                      <button type="submit" class="secondary outline">
                        Log out
                      </button>
                    </form>
                  </li>
                </>
              )}
            </ul>
          </nav>
        </header>
        <main class="container">{children}</main>
      </body>
    </html>
  );
}

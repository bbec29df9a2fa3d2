import { relations } from "drizzle-orm";
import {
  index,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import type { Uuid } from "./uuid";

const currentTimestamp = (name: string) =>
  timestamp(name, { withTimezone: true }).notNull().defaultNow();

export const users = pgTable("users", {
  id: uuid("id").$type<Uuid>().primaryKey(),
  username: varchar("username", { length: 150 }).notNull().unique(),
  email: varchar("email", { length: 254 }).notNull().unique(),
  firstName: varchar("first_name", { length: 30 }).notNull().default(""),
  lastName: varchar("last_name", { length: 150 }).notNull().default(""),
  passwordHash: text("password_hash").notNull(),
  created: currentTimestamp("created"),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;

export const usersRelations = relations(users, ({ one, many }) => ({
  profile: one(userProfiles),
  posts: many(posts),
  comments: many(comments),
}));

export const userProfiles = pgTable("user_profiles", {
  userId: uuid("user_id")
    .$type<Uuid>()
    .primaryKey()
    .references(() => users.id, { onDelete: "cascade" }),
  bio: varchar("bio", { length: 500 }).notNull().default(""),
  location: varchar("location", { length: 100 }).notNull().default(""),
  website: text("website").notNull().default(""),
  avatarUrl: text("avatar_url"),
  created: currentTimestamp("created"),
  updated: currentTimestamp("updated"),
});

export type UserProfile = typeof userProfiles.$inferSelect;

export const userProfilesRelations = relations(userProfiles, ({ one }) => ({
  user: one(users, {
    fields: [userProfiles.userId],
    references: [users.id],
  }),
}));

export const posts = pgTable(
  "posts",
  {
    id: uuid("id").$type<Uuid>().primaryKey(),
    title: varchar("title", { length: 200 }).notNull(),
    content: text("content").notNull(),
    authorId: uuid("author_id")
      .$type<Uuid>()
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    published: currentTimestamp("published"),
    updated: currentTimestamp("updated"),
  },
  (table) => [
    index("posts_author_id_index").on(table.authorId),
    index("posts_published_index").on(table.published),
  ],
);

export type Post = typeof posts.$inferSelect;
export type NewPost = typeof posts.$inferInsert;

export const postsRelations = relations(posts, ({ one, many }) => ({
  author: one(users, {
    fields: [posts.authorId],
    references: [users.id],
  }),
  comments: many(comments),
  tags: many(postTags),
}));

export const comments = pgTable(
  "comments",
  {
    id: uuid("id").$type<Uuid>().primaryKey(),
    postId: uuid("post_id")
      .$type<Uuid>()
      .notNull()
      .references(() => posts.id, { onDelete: "cascade" }),
    authorId: uuid("author_id")
      .$type<Uuid>()
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    content: text("content").notNull(),
    created: currentTimestamp("created"),
    updated: currentTimestamp("updated"),
  },
  (table) => [index("comments_post_id_index").on(table.postId)],
);

export type Comment = typeof comments.$inferSelect;
export type NewComment = typeof comments.$inferInsert;

export const commentsRelations = relations(comments, ({ one }) => ({
  post: one(posts, {
    fields: [comments.postId],
    references: [posts.id],
  }),
  author: one(users, {
    fields: [comments.authorId],
    references: [users.id],
  }),
}));

export const tags = pgTable("tags", {
  id: uuid("id").$type<Uuid>().primaryKey(),
  name: varchar("name", { length: 50 }).notNull().unique(),
  slug: varchar("slug", { length: 50 }).notNull().unique(),
  created: currentTimestamp("created"),
});

export type Tag = typeof tags.$inferSelect;
export type NewTag = typeof tags.$inferInsert;

export const tagsRelations = relations(tags, ({ many }) => ({
  posts: many(postTags),
}));

export const postTags = pgTable(
  "post_tags",
  {
    postId: uuid("post_id")
      .$type<Uuid>()
      .notNull()
      .references(() => posts.id, { onDelete: "cascade" }),
    tagId: uuid("tag_id")
      .$type<Uuid>()
      .notNull()
      .references(() => tags.id, { onDelete: "cascade" }),
  },
  (table) => [
    primaryKey({ columns: [table.postId, table.tagId] }),
    index("post_tags_tag_id_index").on(table.tagId),
  ],
);

export type PostTag = typeof postTags.$inferSelect;

export const postTagsRelations = relations(postTags, ({ one }) => ({
  post: one(posts, {
    fields: [postTags.postId],
    references: [posts.id],
  }),
  tag: one(tags, {
    fields: [postTags.tagId],
    references: [tags.id],
  }),
}));

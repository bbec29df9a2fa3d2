import { parseTagList, validateTagList } from "../tags";
import { characterCount, defineForm, lengthBetween, required } from ".";

export const MIN_TITLE_LENGTH = 3;
export const MAX_TITLE_LENGTH = 200;
export const MIN_CONTENT_LENGTH = 10;
export const MIN_COMMENT_LENGTH = 3;
export const MAX_COMMENT_LENGTH = 5000;

type PostField = "title" | "content" | "tags";

export interface PostInput {
  title: string;
  content: string;
  tags: string[];
}

export const postForm = defineForm<PostField, PostInput>({
  fields: ["title", "content", "tags"],
  validators: [
    ["title", required("Title is required.")],
    ["title", lengthBetween(MIN_TITLE_LENGTH, MAX_TITLE_LENGTH, "Title")],
    ["content", required("Content is required.")],
    [
      "content",
      (value) =>
        characterCount(value) < MIN_CONTENT_LENGTH
          ? `Content must be at least ${MIN_CONTENT_LENGTH} characters long.`
          : undefined,
    ],
    ["tags", (value) => validateTagList(parseTagList(value))],
  ],
  transform: (values) => ({
    title: values.title,
    content: values.content,
    tags: parseTagList(values.tags),
  }),
});

type CommentField = "content";

export interface CommentInput {
  content: string;
}

export const commentForm = defineForm<CommentField, CommentInput>({
  fields: ["content"],
  validators: [
    ["content", required("Comment cannot be empty.")],
    [
      "content",
      lengthBetween(MIN_COMMENT_LENGTH, MAX_COMMENT_LENGTH, "Comment"),
    ],
  ],
  transform: (values) => ({ content: values.content }),
});

import { Hono } from "hono";
import type { Env } from "../login";
import accounts from "./accounts";
import posts from "./posts";

const page = new Hono<Env>();

page.route("/", accounts);
page.route("/", posts);

export default page;

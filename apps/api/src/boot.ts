// apps/api/src/boot.ts
import * as dotenv from "dotenv";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";

const here = dirname(fileURLToPath(import.meta.url));
// .../apps/api/src -> .../apps/api
const apiRoot = resolve(here, "..");
const repoRoot = resolve(apiRoot, "..", "..");

// 1) repo-root .env, never overriding variables already set
dotenv.config({ path: resolve(repoRoot, ".env"), override: false });

// 2) apps/api/.env (optional) wins over the root file
dotenv.config({ path: resolve(apiRoot, ".env"), override: true });

import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const ROOT = process.cwd();

// An explicit INGEST_ENV_FILE wins; dotenv never overrides values already set.
const files = [process.env.INGEST_ENV_FILE, ".env.local", ".env"].filter(
  (f): f is string => typeof f === "string" && f.length > 0
);

for (const file of files) {
  const full = path.resolve(ROOT, file);
  if (fs.existsSync(full)) {
    dotenv.config({ path: full });
  }
}

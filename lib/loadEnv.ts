import { config } from "dotenv";
import { existsSync } from "fs";
import { resolve } from "path";

// Dev server only: deployed handlers get their configuration from the function environment.
const cwd = process.cwd();

for (const file of [".env.local", ".env"]) {
  const path = resolve(cwd, file);
  if (existsSync(path)) config({ path });
}

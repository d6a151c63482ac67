import { readFileSync } from "node:fs";

/** Version from this package's package.json, beside both src/ and dist/. */
export function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  const pkg: unknown = JSON.parse(raw);
  if (
    pkg &&
    typeof pkg === "object" &&
    "version" in pkg &&
    typeof pkg.version === "string"
  ) {
    return pkg.version;
  }
  throw new Error("package.json has no version");
}

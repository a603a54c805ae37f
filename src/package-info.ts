import { createRequire } from "node:module";

type PackageJson = {
  name?: string;
  version?: string;
};

const require = createRequire(import.meta.url);
const packageJson: PackageJson = require("../package.json");

export const packageName = packageJson.name ?? "civicrawl";
export const packageVersion = packageJson.version ?? "0.0.0";

import fs from "fs";
import path from "path";
import { z } from "zod";

const PackageManifestSchema = z.object({
  name: z.string(),
  version: z.string(),
});

// Resolves to the repository root from both src/config and dist/config
const manifest = PackageManifestSchema.parse(
  JSON.parse(fs.readFileSync(path.join(__dirname, "..", "..", "package.json"), "utf-8")),
);

export const SERVICE_NAME = manifest.name;
export const SERVICE_VERSION = manifest.version;

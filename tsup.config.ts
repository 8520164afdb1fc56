import { defineConfig } from "tsup";
import { readFileSync } from "fs";
import { join } from "path";

interface PackageJson {
  dependencies?: Record<string, string>;
  peerDependencies?: Record<string, string>;
  devDependencies?: Record<string, string>;
}

const packageJson: PackageJson = JSON.parse(
  readFileSync(join(process.cwd(), "package.json"), "utf-8"),
);

// Every declared package stays external; users install their own copies
const getAllDependencies = () => {
  const deps = new Set<string>();

  for (const group of [
    packageJson.dependencies,
    packageJson.peerDependencies,
    packageJson.devDependencies,
  ]) {
    for (const dep of Object.keys(group ?? {})) {
      deps.add(dep);
    }
  }

  return Array.from(deps).sort();
};

const allExternals = getAllDependencies();

export default defineConfig([
  // Library
  {
    entry: ["src/index.ts"],
    outDir: "dist/lib",
    format: ["cjs", "esm"],
    dts: true,
    splitting: false,
    sourcemap: true,
    clean: true, // Own subdirectory
    external: allExternals,
  },
  // CLI
  {
    entry: ["scripts/temp-db.ts"],
    outDir: "dist/cli",
    format: ["esm"],
    splitting: false,
    sourcemap: true,
    clean: true,
    external: allExternals,
  },
]);

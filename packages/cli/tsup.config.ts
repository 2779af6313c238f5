import * as fs from 'node:fs';
import * as path from 'node:path';
import { defineConfig } from 'tsup';
import { z } from 'zod';

/** Workspace packages bundled into the output (not external), by directory. */
const BUNDLED_PACKAGES: Record<string, string> = {
  '@notiqd/engine': '../engine',
};

const PackageJsonSchema = z.looseObject({
  name: z.string(),
  version: z.string(),
  engines: z.record(z.string(), z.string()).optional(),
  license: z.string().optional(),
  dependencies: z.record(z.string(), z.string()).optional(),
});

type PackageJson = z.infer<typeof PackageJsonSchema>;

function readPackageJson(dir: string): PackageJson {
  const content = fs.readFileSync(path.resolve(dir, 'package.json'), 'utf-8');
  return PackageJsonSchema.parse(JSON.parse(content));
}

/**
 * Collect runtime dependencies for the published package.json.
 *
 * Takes the CLI package's own dependencies, removes bundled packages,
 * then merges in dependencies from each bundled package (since their
 * external imports become our runtime dependencies).
 */
function collectPublishDependencies(): Record<string, string> {
  const cliPkg = readPackageJson('.');
  const deps = new Map(Object.entries(cliPkg.dependencies ?? {}));

  for (const [name, dir] of Object.entries(BUNDLED_PACKAGES)) {
    deps.delete(name);
    const bundledPkg = readPackageJson(dir);
    for (const [dep, version] of Object.entries(bundledPkg.dependencies ?? {})) {
      // CLI's version takes precedence
      if (!deps.has(dep)) deps.set(dep, version);
    }
  }

  return Object.fromEntries(deps);
}

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  banner: {
    js: '#!/usr/bin/env node',
  },
  noExternal: Object.keys(BUNDLED_PACKAGES),
  async onSuccess() {
    const cliPkg = readPackageJson('.');

    const publishPkg = {
      name: cliPkg.name,
      version: cliPkg.version,
      type: 'module',
      bin: {
        notiqd: './cli.js',
      },
      engines: cliPkg.engines,
      license: cliPkg.license,
      dependencies: collectPublishDependencies(),
    };

    const outPath = path.resolve('dist', 'package.json');
    await fs.promises.writeFile(
      outPath,
      `${JSON.stringify(publishPkg, null, 2)}\n`,
      'utf-8',
    );
  },
});

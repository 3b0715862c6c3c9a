/**
 * Container Image Unit Tests
 *
 * テスト対象:
 * - 実行ステージには Lambda コードが import するパッケージだけが入る
 * - CDK などのビルド用依存をイメージに含めない
 */

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import { builtinModules } from 'module';
import * as path from 'path';

const ROOT = path.join(__dirname, '../..');
const LAMBDA_DIR = path.join(ROOT, 'lambda');

const dockerfile = fs.readFileSync(path.join(ROOT, 'Dockerfile'), 'utf-8');
const stages = dockerfile.split(/^FROM /m);
const runtimeStage = stages[stages.length - 1];

function sourceFiles(dir: string): string[] {
  return fs.readdirSync(dir, { withFileTypes: true }).flatMap((entry) => {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) return sourceFiles(fullPath);
    return entry.name.endsWith('.ts') ? [fullPath] : [];
  });
}

/** Packages the Lambda code loads at run time (type-only imports are erased). */
function runtimePackages(): string[] {
  const packages = new Set<string>();
  for (const file of sourceFiles(LAMBDA_DIR)) {
    const content = fs.readFileSync(file, 'utf-8');
    for (const match of content.matchAll(/^import\s+(?!type\s)[^'"]*from\s+["']([^"']+)["']/gm)) {
      const specifier = match[1];
      if (specifier.startsWith('.') || builtinModules.includes(specifier)) continue;
      const segments = specifier.split('/');
      packages.add(specifier.startsWith('@') ? segments.slice(0, 2).join('/') : segments[0]);
    }
  }
  return [...packages].sort();
}

describe('Lambda container image', () => {
  it('finds the S3 client among the runtime imports', () => {
    expect(runtimePackages()).toEqual(['@aws-sdk/client-s3']);
  });

  it('installs every runtime package by name', () => {
    runtimePackages().forEach((pkg) => {
      expect(dockerfile).toContain(`"${pkg}@`);
    });
  });

  it('does not install the whole dependency list', () => {
    expect(dockerfile).not.toMatch(/npm install --omit=dev\s*$/m);
    expect(runtimeStage).not.toContain('npm install');
    expect(runtimeStage).not.toContain('package.json');
  });

  it('copies only the runtime node_modules and compiled code', () => {
    expect(runtimeStage).toContain('COPY --from=build /runtime/node_modules ${LAMBDA_TASK_ROOT}/node_modules');
    expect(runtimeStage).toContain('COPY --from=build /build/dist ${LAMBDA_TASK_ROOT}/dist');
  });
});

import * as path from 'path';
import corePackage from '../../core/package.json';
import rootPackage from '../../../package.json';
import tsconfig from '../../../tsconfig.json';
import { createProgram } from './index';

describe('manifest-pr program', () => {
  it('should register the check and write commands', () => {
    const program = createProgram();

    expect(program.name()).toBe('manifest-pr');
    expect(program.commands.map((c) => c.name())).toEqual(['check', 'write']);
  });

  it('should require input and output directories for write', () => {
    const write = createProgram().commands.find((c) => c.name() === 'write');
    const required = write?.options.filter((o) => o.mandatory).map((o) => o.long);

    expect(required).toEqual(['--input', '--output']);
  });

  it('should default write to checking for existing pull requests', () => {
    const write = createProgram().commands.find((c) => c.name() === 'write');
    const check = write?.options.find((o) => o.long === '--no-check');

    expect(check?.negate).toBe(true);
  });
});

describe('build layout', () => {
  const repoRoot = path.resolve(__dirname, '..', '..', '..');
  const outDir = path.join(repoRoot, tsconfig.compilerOptions.outDir);

  it('should load the core package from its compiled index at run time', () => {
    expect(path.resolve(repoRoot, 'packages', 'core', corePackage.main))
      .toBe(path.join(outDir, 'packages', 'core', 'src', 'index.js'));
  });

  it('should keep core types on the TypeScript sources', () => {
    expect(corePackage.types).toBe('src/index.ts');
  });

  it('should start the bin from the compiled CLI entry', () => {
    expect(path.resolve(repoRoot, rootPackage.bin['manifest-pr']))
      .toBe(path.join(outDir, 'packages', 'cli', 'src', 'index.js'));
  });
});

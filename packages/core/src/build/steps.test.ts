import { describe, it, expect } from 'vitest';
import { ToolchainConfigSchema } from '@tagship/shared';
import { binaryRelativePath, planBuildSteps } from './steps';

const musl = {
  triple: 'x86_64-unknown-linux-musl',
  runsOn: 'ubuntu-latest',
  host: false,
  systemPackages: ['musl-tools'],
};
const darwinHost = { triple: 'x86_64-apple-darwin', runsOn: 'macos-latest', host: true, systemPackages: [] };

describe('binaryRelativePath', () => {
  it('places cross targets under their triple', () => {
    expect(binaryRelativePath(musl, 'mytool')).toBe('target/x86_64-unknown-linux-musl/release/mytool');
  });

  it('uses the plain release dir for the host', () => {
    expect(binaryRelativePath(darwinHost, 'mytool')).toBe('target/release/mytool');
  });
});

describe('planBuildSteps', () => {
  const toolchain = ToolchainConfigSchema.parse({});

  it('installs packages, toolchain and target before compiling a cross target', () => {
    const steps = planBuildSteps(musl, 'mytool', toolchain);

    expect(steps.map((s) => [s.name, s.command, s.retried])).toEqual([
      ['system-packages', 'sudo apt-get install -y musl-tools', true],
      ['toolchain', 'rustup toolchain install stable --profile minimal', true],
      ['target', 'rustup target add x86_64-unknown-linux-musl', true],
      ['compile', 'cargo build --release --target x86_64-unknown-linux-musl', false],
      ['strip', 'strip target/x86_64-unknown-linux-musl/release/mytool', false],
    ]);
    expect(steps.map((s) => s.failure)).toEqual([
      'ToolchainError',
      'ToolchainError',
      'ToolchainError',
      'CompileError',
      'StripError',
    ]);
  });

  it('builds the host target without --target', () => {
    const steps = planBuildSteps(darwinHost, 'mytool', toolchain);

    expect(steps.map((s) => s.command)).toEqual([
      'rustup toolchain install stable --profile minimal',
      'cargo build --release',
      'strip target/release/mytool',
    ]);
  });

  it('skips installation when the runner provides the toolchain', () => {
    const steps = planBuildSteps(
      { ...musl, systemPackages: [] },
      'mytool',
      ToolchainConfigSchema.parse({ skipInstall: true, stripCommand: 'llvm-strip' }),
    );

    expect(steps.map((s) => s.command)).toEqual([
      'cargo build --release --target x86_64-unknown-linux-musl',
      'llvm-strip target/x86_64-unknown-linux-musl/release/mytool',
    ]);
  });
});

import { CommandKind, ToolchainConfig } from '@tagship/shared';
import { formatCommand } from '@tagship/exec';
import { BuildTarget } from '../matrix/targets';

export type BuildStepName = 'system-packages' | 'toolchain' | 'target' | 'compile' | 'strip';

/** Error kind raised when a step exits non-zero */
export type StepFailure = 'ToolchainError' | 'CompileError' | 'StripError';

export interface BuildStep {
  name: BuildStepName;
  command: string;
  kind: CommandKind;
  failure: StepFailure;
  /** Externally facing; wrapped in the bounded retry */
  retried: boolean;
}

/**
 * Path of the release binary relative to the project root. The archive
 * stores the binary under the same path.
 */
export function binaryRelativePath(target: BuildTarget, tool: string): string {
  return target.host ? `target/release/${tool}` : `target/${target.triple}/release/${tool}`;
}

/**
 * Commands that turn a clean checkout into a stripped release binary for one target.
 */
export function planBuildSteps(
  target: BuildTarget,
  tool: string,
  toolchain: ToolchainConfig,
): BuildStep[] {
  const steps: BuildStep[] = [];

  if (target.systemPackages.length > 0) {
    steps.push({
      name: 'system-packages',
      command: `${toolchain.systemInstallCommand} ${target.systemPackages.join(' ')}`,
      kind: 'install',
      failure: 'ToolchainError',
      retried: true,
    });
  }

  if (!toolchain.skipInstall) {
    steps.push({
      name: 'toolchain',
      command: formatCommand('rustup', [
        'toolchain',
        'install',
        toolchain.channel,
        '--profile',
        toolchain.profile,
      ]),
      kind: 'install',
      failure: 'ToolchainError',
      retried: true,
    });
    if (!target.host) {
      steps.push({
        name: 'target',
        command: formatCommand('rustup', ['target', 'add', target.triple]),
        kind: 'install',
        failure: 'ToolchainError',
        retried: true,
      });
    }
  }

  const compileArgs = ['build', '--release'];
  if (!target.host) {
    compileArgs.push('--target', target.triple);
  }
  steps.push({
    name: 'compile',
    command: formatCommand('cargo', compileArgs),
    kind: 'compile',
    failure: 'CompileError',
    retried: false,
  });

  steps.push({
    name: 'strip',
    command: `${toolchain.stripCommand} ${formatCommand(binaryRelativePath(target, tool), [])}`,
    kind: 'strip',
    failure: 'StripError',
    retried: false,
  });

  return steps;
}

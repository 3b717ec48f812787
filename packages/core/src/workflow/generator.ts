import yaml from 'js-yaml';
import { TagshipConfig } from '@tagship/shared';
import { expandMatrix } from '../matrix/targets';

export interface WorkflowOptions {
  /** Workflow display name */
  name?: string;
  /** How CI runners invoke this CLI */
  cliCommand?: string;
  nodeVersion?: string;
}

export interface WorkflowStep {
  name?: string;
  id?: string;
  uses?: string;
  run?: string;
  with?: Record<string, string | boolean>;
  env?: Record<string, string>;
}

export interface WorkflowJob {
  needs?: string | string[];
  'runs-on': string;
  permissions?: Record<string, string>;
  strategy?: Record<string, unknown>;
  outputs?: Record<string, string>;
  steps: WorkflowStep[];
}

export interface WorkflowDocument {
  name: string;
  on: { push: { tags: string[] } };
  permissions: Record<string, string>;
  jobs: { version: WorkflowJob; build: WorkflowJob; publish: WorkflowJob };
}

const VERSION_OUTPUT = '${{ needs.version.outputs.version }}';

function setupSteps(nodeVersion: string): WorkflowStep[] {
  return [
    { uses: 'actions/checkout@v4' },
    { uses: 'actions/setup-node@v4', with: { 'node-version': nodeVersion } },
  ];
}

/**
 * GitHub Actions workflow that runs the pipeline as separate jobs: the
 * version is computed once, each target builds on its own runner, and the
 * publish job waits on every build.
 */
export function buildWorkflow(
  config: TagshipConfig,
  options: WorkflowOptions = {},
): WorkflowDocument {
  const cli = options.cliCommand ?? 'npx --yes tagship';
  const nodeVersion = options.nodeVersion ?? '20';
  const targets = expandMatrix(config.matrix);
  const storeDir = config.store.dir.replace(/\/+$/, '');
  const tokenEnv = config.release.tokenEnv;

  const strategy: Record<string, unknown> = {
    'fail-fast': config.matrix.failFast,
    matrix: {
      include: targets.map((t) => ({ target: t.triple, os: t.runsOn })),
    },
  };
  if (config.matrix.maxParallel !== undefined) {
    strategy['max-parallel'] = config.matrix.maxParallel;
  }

  return {
    name: options.name ?? 'release',
    on: { push: { tags: ['v*.*.*'] } },
    permissions: { contents: 'read' },
    jobs: {
      version: {
        'runs-on': 'ubuntu-latest',
        outputs: { version: '${{ steps.version.outputs.version }}' },
        steps: [
          ...setupSteps(nodeVersion),
          {
            name: 'Resolve version',
            id: 'version',
            run: `echo "version=$(${cli} version --tag "$GITHUB_REF_NAME")" >> "$GITHUB_OUTPUT"`,
          },
        ],
      },
      build: {
        needs: 'version',
        strategy,
        'runs-on': '${{ matrix.os }}',
        steps: [
          ...setupSteps(nodeVersion),
          {
            name: 'Build ${{ matrix.target }}',
            run: `${cli} build --target \${{ matrix.target }} --version ${VERSION_OUTPUT}`,
          },
          {
            name: 'Upload ${{ matrix.target }} archive',
            uses: 'actions/upload-artifact@v4',
            with: {
              name: `${config.tool}-\${{ matrix.target }}`,
              path: `${storeDir}/${config.tool}-v${VERSION_OUTPUT}-\${{ matrix.target }}.tar.gz*`,
              'if-no-files-found': 'error',
            },
          },
        ],
      },
      publish: {
        needs: ['version', 'build'],
        'runs-on': 'ubuntu-latest',
        permissions: { contents: 'write' },
        steps: [
          ...setupSteps(nodeVersion),
          {
            name: 'Download archives',
            uses: 'actions/download-artifact@v4',
            with: {
              pattern: `${config.tool}-*`,
              path: storeDir,
              'merge-multiple': true,
            },
          },
          {
            name: 'Publish release',
            run: `${cli} publish --tag "$GITHUB_REF_NAME" --version ${VERSION_OUTPUT}`,
            env: {
              [tokenEnv]: '${{ secrets.GITHUB_TOKEN }}',
              // Without a configured repo, publish to the repository running the workflow.
              ...(config.release.repo ? {} : { TAGSHIP_REPO: '${{ github.repository }}' }),
            },
          },
        ],
      },
    },
  };
}

export function renderWorkflow(config: TagshipConfig, options: WorkflowOptions = {}): string {
  return yaml.dump(buildWorkflow(config, options), { lineWidth: -1, noRefs: true });
}

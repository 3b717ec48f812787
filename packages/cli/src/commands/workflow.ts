import path from 'path';
import { Command } from 'commander';
import { buildWorkflow, renderWorkflow } from '@tagship/core';
import { atomicWrite } from '@tagship/shared';
import { CliEnvironment, loadConfig } from '../context';
import { OutputRenderer } from '../output/renderer';
import { GlobalOptions } from '../types';

interface WorkflowCommandOptions {
  output?: string;
  cliCommand?: string;
  nodeVersion?: string;
}

export function registerWorkflowCommand(program: Command, environment: CliEnvironment) {
  program
    .command('workflow')
    .description('Generate a GitHub Actions workflow that releases on v*.*.* tags')
    .option('--output <file>', 'Write the workflow here instead of stdout')
    .option('--cli-command <command>', 'How CI runners invoke tagship')
    .option('--node-version <version>', 'Node.js version installed on CI runners')
    .action(async (options: WorkflowCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const config = loadConfig(globalOpts, environment);
      const workflowOptions = {
        cliCommand: options.cliCommand,
        nodeVersion: options.nodeVersion,
      };

      if (!options.output) {
        if (globalOpts.json) {
          console.log(JSON.stringify(buildWorkflow(config, workflowOptions), null, 2));
        } else {
          process.stdout.write(renderWorkflow(config, workflowOptions));
        }
        return;
      }

      const target = path.resolve(environment.cwd, options.output);
      await atomicWrite(target, renderWorkflow(config, workflowOptions));
      if (globalOpts.json) {
        console.log(JSON.stringify({ path: target }));
      } else {
        renderer.log(`Wrote ${target}`);
      }
    });
}

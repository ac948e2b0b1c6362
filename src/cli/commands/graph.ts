/**
 * Graph Command
 *
 * Read-only views of the knowledge graph:
 *   warden graph project <id>     - Documents, entities and dependencies of a project
 *   warden graph entity <name>    - Projects and documents mentioning an entity
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { AppContextFactory, CommandContext } from '../types.js';
import { openAppContext, withAppContext } from '../app.js';
import { ResourceNotFoundError } from '../../errors/index.js';
import type { ProjectGraph, ProjectInfo } from '../../graph/knowledge-graph.js';

function printProjectGraph(ctx: CommandContext, project: ProjectInfo, graph: ProjectGraph): void {
  ctx.log(`${chalk.bold(project.name || project.id)} ${chalk.dim(`(${project.id})`)}`);
  ctx.log('');

  ctx.log(chalk.bold(`Documents (${graph.documents.length})`));
  for (const doc of graph.documents) {
    ctx.log(`  ${doc.title || doc.id} ${chalk.dim(`[${doc.docType || 'document'}] ${doc.id}`)}`);
  }
  ctx.log('');

  ctx.log(chalk.bold(`Entities (${graph.entities.length})`));
  for (const entity of graph.entities) {
    ctx.log(`  ${entity.name}${entity.type ? chalk.dim(` (${entity.type})`) : ''}`);
  }
  ctx.log('');

  ctx.log(chalk.bold(`Dependencies (${graph.dependencies.length})`));
  for (const dep of graph.dependencies) {
    const description = dep.description ? ` ${chalk.dim(`- ${dep.description}`)}` : '';
    ctx.log(`  → ${dep.entity.name} ${chalk.yellow(`[${dep.type}]`)}${description}`);
  }
}

export function createGraphCommand(
  getContext: () => CommandContext,
  openApp: AppContextFactory = openAppContext
): Command {
  const graphCmd = new Command('graph').description('Inspect the knowledge graph');

  graphCmd
    .command('project <id>')
    .description('Show the documents, entities and dependencies of a project')
    .action(async (projectId: string) => {
      const ctx = getContext();

      await withAppContext(ctx, openApp, async (app) => {
        const graph = await app.graph.getProjectGraph(projectId);
        const { project } = graph;
        if (project === null) {
          throw new ResourceNotFoundError(
            'Project',
            projectId,
            'Index a document first: warden index <file> --project <id>'
          );
        }

        if (ctx.options.json) {
          console.log(JSON.stringify(graph, null, 2));
          return;
        }
        printProjectGraph(ctx, project, graph);
      });
    });

  graphCmd
    .command('entity <name>')
    .description('Show every project and document that mentions an entity')
    .action(async (name: string) => {
      const ctx = getContext();

      await withAppContext(ctx, openApp, async (app) => {
        const mentions = await app.graph.getEntityContext(name);

        if (ctx.options.json) {
          console.log(JSON.stringify({ entity: name, mentions }, null, 2));
          return;
        }

        if (mentions.length === 0) {
          ctx.log(chalk.yellow(`No documents mention "${name}"`));
          return;
        }

        ctx.log(chalk.bold(`"${name}" is mentioned in ${mentions.length} document(s):`));
        for (const mention of mentions) {
          ctx.log(
            `  ${mention.projectName || mention.projectId} ${chalk.dim('›')} ` +
              `${mention.docTitle || mention.docId} ${chalk.dim(`(${mention.docId})`)}`
          );
        }
      });
    });

  return graphCmd;
}

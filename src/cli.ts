#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import winston from 'winston';
import { GrpcClientPool, ControlPlaneClient } from './grpc/client.js';
import type { EvictionResponse, WireNode } from './grpc/types.js';
import { nodeHeader, nodeRow, podHeader, podRow } from './cli/format.js';

const DEFAULT_ADDRESS = 'localhost:50061';

const logger = winston.createLogger({
  level: 'error',
  transports: [new winston.transports.Console({ format: winston.format.simple() })],
});

interface AddressOpts {
  address: string;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    // grpc-js puts the server's message in details
    const details = 'details' in err && typeof err.details === 'string' ? err.details : '';
    return details || err.message;
  }
  return String(err);
}

async function withClient(address: string, fn: (client: ControlPlaneClient) => Promise<void>): Promise<void> {
  const pool = new GrpcClientPool({ logger });
  try {
    await pool.loadProto();
    const ready = await pool.waitForReady(address, 5000);
    if (!ready) {
      console.error(chalk.red(`Cannot connect to ${address}`));
      process.exitCode = 1;
      return;
    }
    await fn(new ControlPlaneClient(pool, address));
  } catch (err) {
    console.error(chalk.red(`Error: ${describeError(err)}`));
    process.exitCode = 1;
  } finally {
    pool.closeAll();
  }
}

function parsePositive(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function printEviction(verb: string, response: EvictionResponse): void {
  console.log(chalk.green(`✓ Node ${response.node_id} ${verb}`));
  for (const pod of response.evicted) {
    console.log(chalk.yellow(`  evicted ${pod.pod_id} (${pod.cpu_request} cpu) → pending`));
  }
}

function printNode(node: WireNode): void {
  console.log(`  ${chalk.cyan(node.node_id)}  ${node.status}  ${node.available_cpu}/${node.total_cpu} cpu`);
}

const program = new Command();

program
  .name('clusterctl')
  .description('Control plane management CLI')
  .version('0.1.0');

function withAddress(command: Command): Command {
  return command.option('-a, --address <addr>', 'gRPC address to connect to', DEFAULT_ADDRESS);
}

// ── clusterctl nodes ──────────────────────────────────────
withAddress(program.command('nodes').description('List cluster nodes'))
  .action(async (opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const [{ nodes }, { leader }] = await Promise.all([client.listNodes(), client.getLeader()]);

      console.log(chalk.bold(`\nLeader: ${leader}\n`));
      console.log(chalk.dim(nodeHeader()));
      console.log(chalk.dim('─'.repeat(56)));

      for (const node of nodes) {
        const row = nodeRow(node, leader);
        if (node.node_id === leader) {
          console.log(chalk.green(row));
        } else if (node.status !== 'healthy') {
          console.log(chalk.red(row));
        } else {
          console.log(row);
        }
      }
      console.log();
    });
  });

// ── clusterctl pods ───────────────────────────────────────
withAddress(program.command('pods').description('List pods'))
  .action(async (opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const { pods } = await client.listPods();

      console.log();
      console.log(chalk.dim(podHeader()));
      console.log(chalk.dim('─'.repeat(48)));
      for (const pod of pods) {
        const row = podRow(pod);
        console.log(pod.status === 'running' ? row : chalk.yellow(row));
      }
      console.log();
    });
  });

// ── clusterctl add-node ───────────────────────────────────
withAddress(program.command('add-node')
  .argument('<id>', 'Node id')
  .argument('<cpu>', 'CPU capacity')
  .description('Register a node'))
  .action(async (id: string, cpu: string, opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const { node } = await client.addNode({ node_id: id, cpu: parsePositive(cpu, 'cpu') });
      console.log(chalk.green('✓ Node added'));
      printNode(node);
    });
  });

// ── clusterctl scale-up ───────────────────────────────────
withAddress(program.command('scale-up')
  .argument('<count>', 'Number of nodes to add')
  .description('Add nodes with generated ids and the default capacity'))
  .action(async (count: string, opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const { nodes } = await client.scaleUp({ count: parsePositive(count, 'count') });
      console.log(chalk.green(`✓ Added ${nodes.length} node(s)`));
      nodes.forEach(printNode);
    });
  });

// ── clusterctl remove-node ────────────────────────────────
withAddress(program.command('remove-node')
  .argument('<id>', 'Node id')
  .description('Delete a node; its pods go back to pending'))
  .action(async (id: string, opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      printEviction('removed', await client.removeNode({ node_id: id }));
    });
  });

// ── clusterctl launch ─────────────────────────────────────
withAddress(program.command('launch')
  .argument('<id>', 'Pod id')
  .argument('<cpu>', 'CPU request')
  .option('-s, --strategy <name>', 'Placement strategy for this pod only')
  .description('Create a pod and place it'))
  .action(async (id: string, cpu: string, opts: AddressOpts & { strategy?: string }) => {
    await withClient(opts.address, async (client) => {
      const result = await client.launchPod({
        pod_id: id,
        cpu: parsePositive(cpu, 'cpu'),
        strategy: opts.strategy ?? '',
      });
      console.log(chalk.green(`✓ Pod ${result.pod_id} scheduled on ${result.node_id} (${result.strategy})`));
    });
  });

// ── clusterctl heartbeat / fail / recover ─────────────────
withAddress(program.command('heartbeat')
  .argument('<id>', 'Node id')
  .description('Record a heartbeat for a node'))
  .action(async (id: string, opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const { node } = await client.heartbeat({ node_id: id });
      console.log(chalk.green('✓ Heartbeat recorded'));
      printNode(node);
    });
  });

withAddress(program.command('fail')
  .argument('<id>', 'Node id')
  .description('Mark a node unhealthy and evict its pods'))
  .action(async (id: string, opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      printEviction('marked unhealthy', await client.failNode({ node_id: id }));
    });
  });

withAddress(program.command('recover')
  .argument('<id>', 'Node id')
  .description('Mark a node healthy again'))
  .action(async (id: string, opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const { node } = await client.recoverNode({ node_id: id });
      console.log(chalk.green('✓ Node recovered'));
      printNode(node);
    });
  });

// ── clusterctl leader ─────────────────────────────────────
withAddress(program.command('leader').description('Show the current leader'))
  .action(async (opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const { leader } = await client.getLeader();
      console.log(leader === 'none' ? chalk.yellow('No healthy node, no leader') : chalk.green(leader));
    });
  });

// ── clusterctl strategy ───────────────────────────────────
withAddress(program.command('strategy')
  .argument('[name]', 'first_fit | best_fit | worst_fit')
  .description('Show or set the placement strategy'))
  .action(async (name: string | undefined, opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      if (!name) {
        const { strategy } = await client.getStrategy();
        console.log(strategy);
        return;
      }
      const { strategy } = await client.setStrategy({ strategy: name });
      if (strategy !== name) {
        console.log(chalk.yellow(`Unknown strategy "${name}", using ${strategy}`));
      } else {
        console.log(chalk.green(`✓ Strategy set to ${strategy}`));
      }
    });
  });

// ── clusterctl metrics ────────────────────────────────────
withAddress(program.command('metrics').description('Show cluster metrics'))
  .action(async (opts: AddressOpts) => {
    await withClient(opts.address, async (client) => {
      const m = await client.getMetrics();
      console.log();
      console.log(`${'Healthy nodes'.padEnd(16)}${m.healthy_nodes}/${m.total_nodes}`);
      console.log(`${'Free CPU'.padEnd(16)}${m.total_free_cpu}`);
      console.log(`${'Running pods'.padEnd(16)}${m.running_pods}`);
      console.log(`${'Pending pods'.padEnd(16)}${m.pending_pods}`);
      console.log();
    });
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(`Error: ${describeError(err)}`));
  process.exit(1);
});

import { Bench } from 'tinybench';
import { Registry, fun, make, registryOf, resolve, token, val } from '../src/index.js';

/**
 * Resolution Benchmark
 *
 * Measures the cost of assembling values out of a registry: direct lookups,
 * a layered application graph, a wide chain of constructors and the
 * override/modifier paths.
 */

interface Logger {
  log(msg: string): string;
}
interface Config {
  url: string;
}
interface Database {
  logger: Logger;
  config: Config;
}
interface UserRepository {
  db: Database;
}
interface UserService {
  repo: UserRepository;
  logger: Logger;
}

const LoggerT = token<Logger>('Logger');
const ConfigT = token<Config>('Config');
const DatabaseT = token<Database>('Database');
const UserRepositoryT = token<UserRepository>('UserRepository');
const UserServiceT = token<UserService>('UserService');

const app = Registry.empty()
  .register(val(LoggerT, { log: () => 'LOG' }))
  .register(val(ConfigT, { url: 'db://local' }))
  .register(fun([LoggerT, ConfigT], DatabaseT, (logger, config) => ({ logger, config })))
  .register(fun([DatabaseT], UserRepositoryT, (db) => ({ db })))
  .register(fun([UserRepositoryT, LoggerT], UserServiceT, (repo, logger) => ({ repo, logger })));

const specialized = app
  .specialize(UserRepositoryT, val(ConfigT, { url: 'db://replica' }))
  .tweak(LoggerT, (logger) => ({ log: (msg) => `[app] ${logger.log(msg)}` }));

// Chain of CHAIN_LENGTH constructors: Step0 <- Step1 <- ... <- StepN
const CHAIN_LENGTH = 50;
const steps = Array.from({ length: CHAIN_LENGTH + 1 }, (_, i) => token<number>(`Step${i}`));
const chain = steps
  .slice(1)
  .reduce(
    (registry, step, i) => registry.register(fun([steps[i]], step, (n) => n + 1)),
    registryOf(val(steps[0], 0))
  );
const lastStep = steps[CHAIN_LENGTH];

async function runResolutionBenchmark() {
  console.log('=== Resolution Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  bench
    // T1: single lookup, no construction
    .add('T1: Direct value', () => {
      make(app, ConfigT);
    })

    // T2: three constructors, shared Logger reused through the working store
    .add('T2: Layered graph', () => {
      make(app, UserServiceT);
    })

    // T3: same graph with an override and a modifier active
    .add('T3: Override + modifier', () => {
      make(specialized, UserServiceT);
    })

    // T4: deep recursion through a long chain
    .add(`T4: Chain of ${CHAIN_LENGTH}`, () => {
      resolve(chain, lastStep);
    })

    // T5: registry assembly alone
    .add('T5: Registry assembly', () => {
      registryOf(
        val(LoggerT, { log: () => 'LOG' }),
        val(ConfigT, { url: 'db://local' }),
        fun([DatabaseT], UserRepositoryT, (db) => ({ db }))
      );
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period || 0) * 1_000_000;
  };

  console.log('\n=== Per-resolution Cost ===\n');
  console.log(`  Direct value:            ${getNs('T1: Direct value').toFixed(0)} ns`);
  console.log(`  Layered graph:           ${getNs('T2: Layered graph').toFixed(0)} ns`);
  console.log(`  Override + modifier:     ${getNs('T3: Override + modifier').toFixed(0)} ns`);
  console.log(
    `  Per chain step:          ${(getNs(`T4: Chain of ${CHAIN_LENGTH}`) / CHAIN_LENGTH).toFixed(0)} ns`
  );
}

runResolutionBenchmark().catch(console.error);

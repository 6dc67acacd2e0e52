import { Bench } from 'tinybench';
import { Container, FactoryCompiler, Inject, Lifestyle, token } from '../src/index.js';

/**
 * Factory Compilation Benchmark
 *
 * Compares compiled factories against hand-written `new` calls for a three
 * level graph, and measures the cost of building and compiling plans.
 */

const loggerT = token<Logger>('Logger');
class Logger {
  log(_msg: string) {
    return 'LOG';
  }
}

const configT = token<Config>('Config');
class Config {
  getValue() {
    return 'config';
  }
}

const databaseT = token<Database>('Database');
class Database {
  constructor(@Inject(loggerT) private readonly logger: Logger) {}
  query() {
    this.logger.log('Query');
    return 'data';
  }
}

const userServiceT = token<UserService>('UserService');
class UserService {
  constructor(
    @Inject(databaseT) private readonly db: Database,
    @Inject(configT) private readonly config: Config,
    @Inject(loggerT) private readonly logger: Logger
  ) {}
  getUser(id: string) {
    this.logger.log(`Getting user ${id} with ${this.config.getValue()}`);
    return this.db.query();
  }
}

const bootstrap = (lifestyle: Lifestyle) => {
  const container = new Container({ name: 'Bench' });
  container.register(loggerT, Logger, lifestyle);
  container.register(configT, Config, lifestyle);
  container.register(databaseT, Database, lifestyle);
  container.register(userServiceT, UserService, Lifestyle.Transient);
  return container;
};

function preWarm(fn: () => void, times = 10000) {
  for (let i = 0; i < times; i++) fn();
}

async function runFactoryBenchmark() {
  console.log('=== Factory Compilation Benchmark ===\n');

  const bench = new Bench({ time: 1000 });

  const transient = bootstrap(Lifestyle.Transient);
  const singleton = bootstrap(Lifestyle.Singleton);
  preWarm(() => transient.resolve(userServiceT));
  preWarm(() => singleton.resolve(userServiceT));

  const planned = bootstrap(Lifestyle.Transient).getRegistration(userServiceT);
  if (!planned) throw new Error('UserService is not registered');
  const compiler = new FactoryCompiler();

  console.log('[phase] warmup complete\n');

  bench
    .add('T1: direct new (baseline)', () => {
      const logger = new Logger();
      new UserService(new Database(logger), new Config(), logger);
    })
    .add('T2: resolve, transient graph', () => {
      transient.resolve(userServiceT);
    })
    .add('T3: resolve, singleton dependencies', () => {
      singleton.resolve(userServiceT);
    })
    .add('T4: build plan only', () => {
      planned.buildExpression();
    })
    .add('T5: build and compile plan', () => {
      compiler.compile(planned.buildExpression(), UserService);
    });

  console.log(`[phase] running ${bench.tasks.length} tasks...`);
  await bench.run();
  console.table(bench.table());

  const getNs = (name: string) => {
    const task = bench.tasks.find((t) => t.name === name);
    return (task?.result?.period || 0) * 1_000_000;
  };

  const baseline = getNs('T1: direct new (baseline)');
  const compiled = getNs('T2: resolve, transient graph');
  console.log('\n=== Overhead ===\n');
  console.log(`  Direct new (T1):          ${baseline.toFixed(0)} ns`);
  console.log(`  Compiled factory (T2):    ${compiled.toFixed(0)} ns`);
  console.log(`  Overhead (T2 - T1):       +${(compiled - baseline).toFixed(0)} ns`);
}

runFactoryBenchmark().catch(console.error);

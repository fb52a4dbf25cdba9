import { GraphExecutor, ExecutorError } from '../../src/engine/executor';
import { Graph } from '../../src/engine/graph';
import { NodeError, NodeHandler, createNodeRegistry } from '../../src/engine/registry';
import { missingPreconditionError } from '../../src/domain/errors';
import { EdgeMap } from '../../src/domain/graph';
import { RunTermination } from '../../src/domain/run';
import { WorkflowState } from '../../src/domain/state';
import { captureLogs } from '../helpers';

const handlers: NodeHandler[] = [
  {
    name: 'increment',
    execute: (state) => {
      const count = state.count;
      return { ...state, count: (typeof count === 'number' ? count : 0) + 1 };
    },
  },
  { name: 'noop', execute: () => undefined },
  {
    name: 'halt',
    execute: (state) => {
      state.stop = true;
      return state;
    },
  },
  {
    name: 'jump',
    execute: (state) => {
      const target = state.target;
      state.next_node = typeof target === 'string' ? target : null;
      return state;
    },
  },
  {
    name: 'both',
    execute: (state) => {
      state.stop = true;
      state.next_node = 'increment';
      return state;
    },
  },
  {
    name: 'boom',
    execute: () => {
      throw new Error('kaboom');
    },
  },
  {
    name: 'needs_input',
    execute: () => {
      throw new NodeError(missingPreconditionError('needs_input', 'input'));
    },
  },
  {
    name: 'append',
    execute: (state) => {
      const current = state.items;
      const items = Array.isArray(current) ? current : [];
      items.push(items.length);
      state.items = items;
      return state;
    },
  },
  { name: 'replace', execute: () => ({ replaced: true }) },
];

const registry = createNodeRegistry(handlers);

function makeGraph(nodes: string[], edges: EdgeMap = {}, startNode = nodes[0]): Graph {
  return Graph.fromDefinition(registry, { id: 'graph_test', name: 'Executor Test', nodes, edges, startNode });
}

function runError(fn: () => unknown): ExecutorError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExecutorError) return err;
    throw err;
  }
  throw new Error('expected ExecutorError');
}

describe('GraphExecutor', () => {
  test('a single node without edge or control keys runs exactly one step', () => {
    const run = new GraphExecutor(makeGraph(['noop'])).run({});

    expect(run.steps).toBe(1);
    expect(run.currentNode).toBeNull();
    expect(run.termination).toBe(RunTermination.Completed);
    expect(run.log).toEqual([{ step: 1, node: 'noop', stateSnapshot: {} }]);
  });

  test('follows static edges until a terminal node', () => {
    const run = new GraphExecutor(makeGraph(['increment', 'noop'], { increment: 'noop' })).run({ count: 0 });

    expect(run.log.map((e) => e.node)).toEqual(['increment', 'noop']);
    expect(run.state).toEqual({ count: 1 });
    expect(run.currentNode).toBeNull();
  });

  test('carries run and graph identity', () => {
    const run = new GraphExecutor(makeGraph(['noop'])).run({}, 'run_1');

    expect(run.id).toBe('run_1');
    expect(run.graphId).toBe('graph_test');
    expect(Date.parse(run.completedAt)).toBeGreaterThanOrEqual(Date.parse(run.startedAt));
  });

  test('next_node overrides the static edge and stays in that step snapshot only', () => {
    const graph = makeGraph(['jump', 'halt', 'noop'], { jump: 'noop' });
    const run = new GraphExecutor(graph).run({ target: 'halt' });

    expect(run.log).toEqual([
      { step: 1, node: 'jump', stateSnapshot: { target: 'halt', next_node: 'halt' } },
      { step: 2, node: 'halt', stateSnapshot: { target: 'halt', stop: true } },
    ]);
    expect(run.currentNode).toBe('halt');
    expect(run.termination).toBe(RunTermination.Stopped);
    expect(run.state).toEqual({ target: 'halt', stop: true });
  });

  test('an empty next_node is removed and the static edge is used', () => {
    const graph = makeGraph(['jump', 'noop'], { jump: 'noop' });
    const run = new GraphExecutor(graph).run({ target: '' });

    expect(run.log[0].stateSnapshot).toEqual({ target: '', next_node: '' });
    expect(run.log[1].node).toBe('noop');
    expect(run.state).toEqual({ target: '' });
    expect(run.currentNode).toBeNull();
  });

  test('stop takes precedence over next_node, which is left in state', () => {
    const run = new GraphExecutor(makeGraph(['both', 'increment'])).run({});

    expect(run.steps).toBe(1);
    expect(run.currentNode).toBe('both');
    expect(run.termination).toBe(RunTermination.Stopped);
    expect(run.state).toEqual({ stop: true, next_node: 'increment' });
  });

  test('a node may return a replacement state', () => {
    const run = new GraphExecutor(makeGraph(['replace', 'noop'], { replace: 'noop' })).run({ a: 1 });

    expect(run.state).toEqual({ replaced: true });
    expect(run.log[1].stateSnapshot).toEqual({ replaced: true });
  });

  test('a node returning nothing keeps the current state', () => {
    const run = new GraphExecutor(makeGraph(['noop'])).run({ kept: 1 });

    expect(run.state).toEqual({ kept: 1 });
  });

  test('truncates silently at the step ceiling', () => {
    const graph = makeGraph(['increment'], { increment: 'increment' });
    const run = new GraphExecutor(graph, { maxSteps: 5 }).run({});

    expect(run.steps).toBe(5);
    expect(run.state).toEqual({ count: 5 });
    expect(run.currentNode).toBe('increment');
    expect(run.termination).toBe(RunTermination.StepLimit);
    expect(run.log.map((e) => e.step)).toEqual([1, 2, 3, 4, 5]);
  });

  test('defaults the step ceiling to 100', () => {
    const run = new GraphExecutor(makeGraph(['increment'], { increment: 'increment' })).run({});

    expect(run.steps).toBe(100);
    expect(run.state.count).toBe(100);
  });

  test('reaching a terminal node on the last allowed step is a normal completion', () => {
    const graph = makeGraph(['increment', 'noop'], { increment: 'noop' });
    const run = new GraphExecutor(graph, { maxSteps: 2 }).run({});

    expect(run.termination).toBe(RunTermination.Completed);
    expect(run.currentNode).toBeNull();
  });

  test('rejects a non-positive or fractional step ceiling', () => {
    const graph = makeGraph(['noop']);

    expect(runError(() => new GraphExecutor(graph, { maxSteps: 0 })).typedError.code).toBe('VALIDATION.MAX_STEPS');
    expect(runError(() => new GraphExecutor(graph, { maxSteps: 1.5 })).typedError.code).toBe('VALIDATION.MAX_STEPS');
  });

  test('a dangling edge target aborts the run with RUN.UNREGISTERED_NODE', () => {
    const graph = makeGraph(['increment'], { increment: 'ghost' });
    const error = runError(() => new GraphExecutor(graph).run({}, 'run_9'));

    expect(error.typedError).toMatchObject({
      code: 'RUN.UNREGISTERED_NODE',
      node: 'ghost',
      runId: 'run_9',
      details: { step: 2 },
    });
  });

  test('a next_node pointing at a registered but undeclared node aborts the run', () => {
    const error = runError(() => new GraphExecutor(makeGraph(['jump'])).run({ target: 'halt' }));

    expect(error.typedError.code).toBe('RUN.UNREGISTERED_NODE');
    expect(error.typedError.node).toBe('halt');
  });

  test('an exception inside a node becomes NODE.EXECUTION_ERROR', () => {
    const error = runError(() => new GraphExecutor(makeGraph(['boom'])).run({}, 'run_2'));

    expect(error.typedError).toMatchObject({
      code: 'NODE.EXECUTION_ERROR',
      message: 'kaboom',
      node: 'boom',
      runId: 'run_2',
      details: { step: 1 },
    });
  });

  test('a NodeError keeps its typed cause and gains the step number', () => {
    const error = runError(() => new GraphExecutor(makeGraph(['needs_input'])).run({}));

    expect(error.typedError).toMatchObject({
      code: 'NODE.MISSING_PRECONDITION',
      node: 'needs_input',
      details: { key: 'input', step: 1 },
    });
  });

  test('log snapshots are deep copies', () => {
    const graph = makeGraph(['append'], { append: 'append' });
    const run = new GraphExecutor(graph, { maxSteps: 3 }).run({});

    expect(run.log.map((e) => e.stateSnapshot.items)).toEqual([[0], [0, 1], [0, 1, 2]]);
  });

  test('does not add keys to the caller-supplied state object', () => {
    const initial: WorkflowState = { target: 'halt' };
    new GraphExecutor(makeGraph(['halt'])).run(initial);

    expect(initial).toEqual({ target: 'halt' });
  });

  test('log steps, step count and final node agree for every termination kind', () => {
    const cases = [
      new GraphExecutor(makeGraph(['noop'])).run({}),
      new GraphExecutor(makeGraph(['increment', 'noop'], { increment: 'noop' })).run({}),
      new GraphExecutor(makeGraph(['jump', 'halt'])).run({ target: 'halt' }),
      new GraphExecutor(makeGraph(['increment'], { increment: 'increment' }), { maxSteps: 7 }).run({}),
    ];

    for (const run of cases) {
      expect(run.log).toHaveLength(run.steps);
      run.log.forEach((entry, i) => expect(entry.step).toBe(i + 1));

      const last = run.log[run.log.length - 1];
      if (last.stateSnapshot.stop) {
        expect(run.currentNode).toBe(last.node);
      } else if (run.termination === RunTermination.Completed) {
        expect(run.currentNode).toBeNull();
      }
    }
    expect(cases.map((r) => r.termination)).toEqual([
      RunTermination.Completed,
      RunTermination.Completed,
      RunTermination.Stopped,
      RunTermination.StepLimit,
    ]);
  });

  describe('logging', () => {
    let logs: ReturnType<typeof captureLogs>;

    beforeEach(() => {
      logs = captureLogs();
    });

    afterEach(() => {
      logs.restore();
    });

    test('logs each step at debug level and the outcome at info level', () => {
      new GraphExecutor(makeGraph(['increment', 'noop'], { increment: 'noop' })).run({}, 'run_log');

      const steps = logs.entries.filter((e) => e.message === 'Step completed');
      expect(steps.map((e) => e.context?.node)).toEqual(['increment', 'noop']);

      const finished = logs.entries.find((e) => e.message === 'Run finished');
      expect(finished?.level).toBe('info');
      expect(finished?.context).toMatchObject({ runId: 'run_log', graphId: 'graph_test', steps: 2, termination: 'completed' });
    });

    test('warns when a run is truncated', () => {
      new GraphExecutor(makeGraph(['increment'], { increment: 'increment' }), { maxSteps: 3 }).run({});

      const warning = logs.entries.find((e) => e.level === 'warn');
      expect(warning?.message).toBe('Run truncated at step ceiling');
      expect(warning?.context).toMatchObject({ maxSteps: 3, pendingNode: 'increment' });
    });

    test('logs node failures at error level with the run context', () => {
      runError(() => new GraphExecutor(makeGraph(['boom'])).run({}, 'run_fail'));

      const failure = logs.entries.find((e) => e.level === 'error');
      expect(failure?.message).toBe('Node failed');
      expect(failure?.context).toMatchObject({
        module: 'executor',
        graphId: 'graph_test',
        runId: 'run_fail',
        node: 'boom',
        step: 1,
        code: 'NODE.EXECUTION_ERROR',
      });
    });
  });
});

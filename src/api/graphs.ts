/**
 * Graph API routes.
 *
 * POST /graph/create - Create a graph from node names, edges and a start node
 * GET /graph/:graphId - Fetch a graph definition
 * POST /graph/run - Run a graph against an initial state
 * GET /graph/state/:runId - Fetch a finished run
 */

import { Router } from 'express';
import { EdgeMap } from '../domain/graph';
import { notFoundError, validationError } from '../domain/errors';
import { Run } from '../domain/run';
import { WorkflowState, isWorkflowState } from '../domain/state';
import { WorkflowService } from '../engine/workflow-service';

type ParseResult<T> = { ok: true; value: T } | { ok: false; message: string };

interface CreateGraphBody {
  name: string;
  nodes: string[];
  edges: EdgeMap;
  start_node: string;
}

interface RunGraphBody {
  graph_id: string;
  initial_state: WorkflowState;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isEdgeMap(value: unknown): value is EdgeMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => v === null || typeof v === 'string')
  );
}

export function parseCreateGraphBody(body: unknown): ParseResult<CreateGraphBody> {
  if (!isWorkflowState(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }
  const { name, nodes, edges, start_node: startNode } = body;
  if (typeof name !== 'string') return { ok: false, message: 'name must be a string' };
  if (!isStringArray(nodes)) return { ok: false, message: 'nodes must be an array of strings' };
  if (!isEdgeMap(edges)) return { ok: false, message: 'edges must map node names to a node name or null' };
  if (typeof startNode !== 'string') return { ok: false, message: 'start_node must be a string' };
  return { ok: true, value: { name, nodes, edges, start_node: startNode } };
}

export function parseRunGraphBody(body: unknown): ParseResult<RunGraphBody> {
  if (!isWorkflowState(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }
  const { graph_id: graphId, initial_state: initialState } = body;
  if (typeof graphId !== 'string') return { ok: false, message: 'graph_id must be a string' };
  if (initialState === undefined) return { ok: true, value: { graph_id: graphId, initial_state: {} } };
  if (!isWorkflowState(initialState)) return { ok: false, message: 'initial_state must be a JSON object' };
  return { ok: true, value: { graph_id: graphId, initial_state: initialState } };
}

/** Wire shape of a run's log. */
function serializeLog(run: Run) {
  return run.log.map((entry) => ({
    step: entry.step,
    node: entry.node,
    state_snapshot: entry.stateSnapshot,
  }));
}

export function createGraphRoutes(service: WorkflowService): Router {
  const router = Router();

  /**
   * POST /graph/create
   * Validate node names against the registry and store the graph.
   */
  router.post('/create', async (req, res, next) => {
    try {
      const parsed = parseCreateGraphBody(req.body);
      if (!parsed.ok) {
        res.status(400).json({ error: validationError(parsed.message) });
        return;
      }
      const graph = await service.createGraph({
        name: parsed.value.name,
        nodes: parsed.value.nodes,
        edges: parsed.value.edges,
        startNode: parsed.value.start_node,
      });
      res.status(201).json({ graph_id: graph.id });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /graph/run
   * Execute a stored graph synchronously and return its log.
   */
  router.post('/run', async (req, res, next) => {
    try {
      const parsed = parseRunGraphBody(req.body);
      if (!parsed.ok) {
        res.status(400).json({ error: validationError(parsed.message) });
        return;
      }
      const run = await service.runGraph(parsed.value.graph_id, parsed.value.initial_state);
      res.json({
        run_id: run.id,
        final_state: run.state,
        log: serializeLog(run),
        current_node: run.currentNode,
        termination: run.termination,
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /graph/state/:runId
   * Return the stored record of a finished run.
   */
  router.get('/state/:runId', async (req, res, next) => {
    try {
      const run = await service.getRun(req.params.runId);
      if (!run) {
        res.status(404).json({ error: notFoundError('Run', req.params.runId) });
        return;
      }
      res.json({
        run_id: run.id,
        graph_id: run.graphId,
        current_node: run.currentNode,
        state: run.state,
        log: serializeLog(run),
        termination: run.termination,
      });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /graph/:graphId
   * Return the stored definition.
   */
  router.get('/:graphId', async (req, res, next) => {
    try {
      const graph = await service.getGraph(req.params.graphId);
      if (!graph) {
        res.status(404).json({ error: notFoundError('Graph', req.params.graphId) });
        return;
      }
      const definition = graph.toDefinition();
      res.json({
        graph: {
          graph_id: definition.id,
          name: definition.name,
          nodes: definition.nodes,
          edges: definition.edges,
          start_node: definition.startNode,
        },
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

import { FastMCP, UserError } from 'fastmcp';
import type { Context as HonoContext, Hono } from 'hono';
import { z } from 'zod';
import { describeError, isLadderError, type LadderErrorCode } from '../../errors';
import { L5xFormatError } from '../../services/l5xRoutineService';
import type { LadderApplicationService, RoutineLoadResponse } from '../ladderApplicationService';

export interface LadderMcpServerOptions {
  endpoint?: `/${string}`;
  host?: string;
  port: number;
}

export interface LadderMcpServer {
  start(): Promise<void>;
  stop(): Promise<void>;
}

const index = z.coerce.number().int().min(0);
const coordinate = z.coerce.number();

const rungSourceSchema = z.object({
  text: z.string(),
  comment: z.string().optional()
});

const routineLoadSchema = z
  .object({
    name: z.string().min(1).optional(),
    rungs: z.array(rungSourceSchema).optional(),
    l5x: z.string().min(1).optional(),
    routineName: z.string().min(1).optional()
  })
  .refine(body => body.rungs !== undefined || body.l5x !== undefined, {
    message: 'Provide either rungs or l5x.'
  });

const layoutQuerySchema = z.object({
  rungNumber: index.optional()
});

const insertInstructionSchema = z
  .object({
    instruction: z.string().min(1),
    rungNumber: index.optional(),
    position: index.optional(),
    branchId: index.optional(),
    x: coordinate.optional(),
    y: coordinate.optional()
  })
  .refine(
    body => (body.x !== undefined && body.y !== undefined) || (body.rungNumber !== undefined && body.position !== undefined),
    { message: 'Provide rungNumber and position, or x and y.' }
  );

const replaceInstructionSchema = z.object({
  instruction: z.string().min(1),
  rungNumber: index,
  position: index
});

const moveBranchSchema = z.object({
  rungNumber: index,
  branchId: index,
  position: index,
  targetBranchId: index.optional()
});

const insertBranchSchema = z.object({
  rungNumber: index,
  start: index,
  end: index,
  branchId: index.optional()
});

const elementLocationSchema = z.object({
  rungNumber: index,
  position: index
});

const branchLocationSchema = z.object({
  rungNumber: index,
  branchId: index
});

const commentSchema = z.object({
  rungNumber: index,
  comment: z.string().optional()
});

const rungAddSchema = z.object({
  text: z.string().optional(),
  comment: z.string().optional(),
  index: index.optional()
});

const rungRemoveSchema = z.object({
  rungNumber: index
});

const locateSchema = z.object({
  x: coordinate,
  y: coordinate
});

const insertionQuerySchema = z.object({
  x: coordinate,
  rungNumber: index,
  branchLevel: index,
  branchId: index.optional()
});

type RoutineLoadBody = z.infer<typeof routineLoadSchema>;

const jsonString = (value: unknown): string => JSON.stringify(value, null, 2);

export function createLadderMcpServer(
  ladderApp: LadderApplicationService,
  options: LadderMcpServerOptions
): LadderMcpServer {
  const server = new FastMCP({
    instructions:
      'Use ladder_* tools to load a ladder routine, read rung layouts, and insert or remove instructions and branches.',
    name: 'ladder-editor-mcp',
    version: '0.1.0'
  });

  registerTools(server, ladderApp);
  registerResources(server, ladderApp);
  registerRestRoutes(server.getApp(), ladderApp);

  return {
    start: () =>
      server.start({
        httpStream: {
          endpoint: options.endpoint ?? '/mcp',
          host: options.host ?? '127.0.0.1',
          port: options.port
        },
        transportType: 'httpStream'
      }),
    stop: () => server.stop()
  };
}

function loadRoutine(ladderApp: LadderApplicationService, body: RoutineLoadBody): RoutineLoadResponse {
  if (body.l5x !== undefined) {
    return ladderApp.loadL5x(body.l5x, body.routineName);
  }
  return ladderApp.loadRoutine({ name: body.name, rungs: body.rungs ?? [] });
}

// Tool failures caused by the request surface to the client as user errors.
async function runTool(operation: () => unknown): Promise<string> {
  try {
    return jsonString(operation());
  } catch (error) {
    if (isLadderError(error) || error instanceof L5xFormatError) {
      throw new UserError(describeError(error));
    }
    throw error;
  }
}

function registerTools(server: FastMCP, ladderApp: LadderApplicationService): void {
  server.addTool({
    description: 'Load a ladder routine from rung texts or from L5X export content.',
    execute: async args => runTool(() => loadRoutine(ladderApp, args)),
    name: 'ladder_routine_load',
    parameters: routineLoadSchema
  });

  server.addTool({
    description: 'Get laid-out elements and branch boxes for one rung or the whole routine.',
    execute: async ({ rungNumber }) => runTool(() => ladderApp.getLayout(rungNumber)),
    name: 'ladder_layout_get',
    parameters: layoutQuerySchema
  });

  server.addTool({
    description: 'Insert an instruction such as XIC(Start) by rung position or by canvas coordinates.',
    execute: async args => runTool(() => ladderApp.insertInstruction(args)),
    name: 'ladder_insert_instruction',
    parameters: insertInstructionSchema
  });

  server.addTool({
    description: 'Replace the instruction at a rung position, keeping its place in the rung.',
    execute: async args => runTool(() => ladderApp.replaceInstruction(args)),
    name: 'ladder_replace_instruction',
    parameters: replaceInstructionSchema
  });

  server.addTool({
    description: 'Wrap the elements between start and end (exclusive) in a new branch with an empty parallel rail.',
    execute: async args => runTool(() => ladderApp.insertBranch(args)),
    name: 'ladder_insert_branch',
    parameters: insertBranchSchema
  });

  server.addTool({
    description: 'Add a parallel rail below the rail opened at the given branch marker position.',
    execute: async args => runTool(() => ladderApp.insertBranchLevel(args)),
    name: 'ladder_insert_branch_level',
    parameters: elementLocationSchema
  });

  server.addTool({
    description: 'Move a whole branch to another position, optionally onto another rail (targetBranchId).',
    execute: async args => runTool(() => ladderApp.moveBranch(args)),
    name: 'ladder_move_branch',
    parameters: moveBranchSchema
  });

  server.addTool({
    description: 'Remove a branch, or a single parallel rail, with everything on it.',
    execute: async args => runTool(() => ladderApp.removeBranch(args)),
    name: 'ladder_remove_branch',
    parameters: branchLocationSchema
  });

  server.addTool({
    description: 'Remove the element at a rung position. Branch markers remove their branch or rail.',
    execute: async args => runTool(() => ladderApp.removeElement(args)),
    name: 'ladder_remove_element',
    parameters: elementLocationSchema
  });

  server.addTool({
    description: 'Set or clear a rung comment.',
    execute: async args => runTool(() => ladderApp.setComment(args)),
    name: 'ladder_set_comment',
    parameters: commentSchema
  });

  server.addTool({
    description: 'Add a rung, optionally with text, at the end or at the given index.',
    execute: async args => runTool(() => ladderApp.addRung(args)),
    name: 'ladder_rung_add',
    parameters: rungAddSchema
  });

  server.addTool({
    description: 'Remove a rung.',
    execute: async ({ rungNumber }) => runTool(() => ladderApp.removeRung(rungNumber)),
    name: 'ladder_rung_remove',
    parameters: rungRemoveSchema
  });

  server.addTool({
    description: 'Find the rung and branch rail under a canvas coordinate.',
    execute: async ({ x, y }) => runTool(() => ladderApp.locate(x, y)),
    name: 'ladder_locate',
    parameters: locateSchema
  });

  server.addTool({
    description: 'Compute the sequence position an insertion at x would take on a rung rail.',
    execute: async args => runTool(() => ladderApp.findInsertionPosition(args)),
    name: 'ladder_find_insertion_position',
    parameters: insertionQuerySchema
  });
}

function registerResources(server: FastMCP, ladderApp: LadderApplicationService): void {
  server.addResource({
    description: 'Current routine as numbered rung texts and comments.',
    load: async () => ({
      mimeType: 'application/json',
      text: jsonString(ladderApp.getRoutine())
    }),
    mimeType: 'application/json',
    name: 'ladder-editor-routine',
    uri: 'resource://ladder-editor/routine'
  });

  server.addResource({
    description: 'Layout of every rung plus the routine extent.',
    load: async () => ({
      mimeType: 'application/json',
      text: jsonString(ladderApp.getLayout())
    }),
    mimeType: 'application/json',
    name: 'ladder-editor-layout',
    uri: 'resource://ladder-editor/layout'
  });
}

export function registerRestRoutes(app: Hono, ladderApp: LadderApplicationService): void {
  app.get('/api/v1', c =>
    c.json({
      endpoints: {
        branchInsert: '/api/v1/branches/insert',
        branchInsertLevel: '/api/v1/branches/insert-level',
        branchMove: '/api/v1/branches/move',
        branchRemove: '/api/v1/branches/remove',
        commentSet: '/api/v1/comments/set',
        elementRemove: '/api/v1/elements/remove',
        extent: '/api/v1/extent',
        health: '/api/v1/health',
        insertionPosition: '/api/v1/insertion-position',
        instructionInsert: '/api/v1/instructions/insert',
        instructionReplace: '/api/v1/instructions/replace',
        layout: '/api/v1/layout',
        locate: '/api/v1/locate',
        routine: '/api/v1/routine',
        routineExport: '/api/v1/routine/l5x',
        routineLoad: '/api/v1/routine/load',
        rungAdd: '/api/v1/rungs/add',
        rungRemove: '/api/v1/rungs/remove'
      },
      mcpEndpoint: '/mcp'
    })
  );

  app.get('/api/v1/health', c =>
    c.json({
      service: 'ladder-editor-mcp',
      status: 'ok'
    })
  );

  app.get('/api/v1/routine', c => c.json(ladderApp.getRoutine()));
  app.get('/api/v1/routine/l5x', c => respond(c, () => ladderApp.exportL5x(c.req.query('program'))));
  app.get('/api/v1/extent', c => c.json(ladderApp.getExtent()));
  app.get('/api/v1/layout', c => {
    const parsed = layoutQuerySchema.safeParse({ rungNumber: c.req.query('rung') });
    if (!parsed.success) {
      return invalidParams(c, parsed.error);
    }
    return respond(c, () => ladderApp.getLayout(parsed.data.rungNumber));
  });

  app.post('/api/v1/routine/load', async c => withBody(c, routineLoadSchema, body => loadRoutine(ladderApp, body)));
  app.post('/api/v1/rungs/add', async c => withBody(c, rungAddSchema, body => ladderApp.addRung(body)));
  app.post('/api/v1/rungs/remove', async c =>
    withBody(c, rungRemoveSchema, body => ladderApp.removeRung(body.rungNumber))
  );
  app.post('/api/v1/instructions/insert', async c =>
    withBody(c, insertInstructionSchema, body => ladderApp.insertInstruction(body))
  );
  app.post('/api/v1/instructions/replace', async c =>
    withBody(c, replaceInstructionSchema, body => ladderApp.replaceInstruction(body))
  );
  app.post('/api/v1/branches/insert', async c => withBody(c, insertBranchSchema, body => ladderApp.insertBranch(body)));
  app.post('/api/v1/branches/insert-level', async c =>
    withBody(c, elementLocationSchema, body => ladderApp.insertBranchLevel(body))
  );
  app.post('/api/v1/branches/move', async c => withBody(c, moveBranchSchema, body => ladderApp.moveBranch(body)));
  app.post('/api/v1/branches/remove', async c =>
    withBody(c, branchLocationSchema, body => ladderApp.removeBranch(body))
  );
  app.post('/api/v1/elements/remove', async c =>
    withBody(c, elementLocationSchema, body => ladderApp.removeElement(body))
  );
  app.post('/api/v1/comments/set', async c => withBody(c, commentSchema, body => ladderApp.setComment(body)));
  app.post('/api/v1/locate', async c => withBody(c, locateSchema, body => ladderApp.locate(body.x, body.y)));
  app.post('/api/v1/insertion-position', async c =>
    withBody(c, insertionQuerySchema, body => ladderApp.findInsertionPosition(body))
  );
}

async function withBody<T>(
  c: HonoContext,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: (body: T) => object
): Promise<Response> {
  const raw = await safeJson(c);
  const parsed = schema.safeParse(raw);

  if (!parsed.success) {
    return invalidParams(c, parsed.error);
  }
  return respond(c, () => handler(parsed.data));
}

function invalidParams(c: HonoContext, error: z.ZodError): Response {
  return c.json(
    {
      code: 'invalid_params',
      issues: error.issues.map(issue => ({
        message: issue.message,
        path: issue.path.join('.')
      }))
    },
    400
  );
}

function respond(c: HonoContext, handler: () => object): Response {
  try {
    return c.json(handler());
  } catch (error) {
    return handleLadderError(c, error);
  }
}

async function safeJson(c: HonoContext): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return {};
  }
}

const MISSING_TARGET_CODES: ReadonlySet<LadderErrorCode> = new Set<LadderErrorCode>(['PositionOutOfRange', 'BranchNotFound']);

function handleLadderError(c: HonoContext, error: unknown): Response {
  const message = describeError(error);

  if (isLadderError(error)) {
    const body = { code: error.code, message, details: error.details };
    if (error.recoverable) {
      return c.json(body, 409);
    }
    if (MISSING_TARGET_CODES.has(error.code)) {
      return c.json(body, 404);
    }
    return c.json(body, 422);
  }
  if (error instanceof L5xFormatError) {
    return c.json({ code: 'invalid_l5x', message }, 422);
  }

  return c.json({ code: 'internal_error', message }, 500);
}

import type {
  ActionData,
  Flow,
  FlowEdge,
  FlowNode,
  JsonObject,
  MessageData,
  QuestionData,
} from '../src/types/flow-types.js';

export function question(id: string, data: QuestionData = {}): FlowNode {
  return { id, type: 'question', data };
}

export function action(id: string, data: ActionData = {}): FlowNode {
  return { id, type: 'action', data };
}

export function message(id: string, data: MessageData = {}): FlowNode {
  return { id, type: 'message', data };
}

export function edge(source: string, target: string, viaLabel?: string): FlowEdge {
  return viaLabel === undefined ? { source, target, data: {} } : { source, target, viaLabel, data: {} };
}

export function makeFlow(
  nodes: readonly FlowNode[],
  edges: readonly FlowEdge[],
  extra: { id?: string; name?: string; metadata?: JsonObject } = {}
): Flow {
  return {
    id: extra.id ?? 'flow',
    name: extra.name ?? 'Flow',
    nodes,
    edges,
    metadata: extra.metadata ?? {},
  };
}

/** start -[yes]-> loop -> start, start -[no]-> end */
export function cyclicFlow(): Flow {
  return makeFlow(
    [question('start', { question: 'Begin?', expectedAnswers: ['yes', 'no'] }), action('loop'), message('end')],
    [edge('start', 'loop', 'yes'), edge('loop', 'start'), edge('start', 'end', 'no')]
  );
}

/** start fans out to `count` actions that all lead to `terminal` */
export function branchingFlow(count: number): Flow {
  const nodes: FlowNode[] = [question('start', { question: 'Begin?' }), message('terminal', { message: 'done' })];
  const edges: FlowEdge[] = [];
  for (let index = 0; index < count; index++) {
    const nodeId = `branch_${index}`;
    nodes.push(action(nodeId, { action: nodeId }));
    edges.push(edge('start', nodeId, String(index)));
    edges.push(edge(nodeId, 'terminal'));
  }
  return makeFlow(nodes, edges);
}

/** The three-node flow used for canonical serialization */
export function sampleFlow(): Flow {
  return makeFlow(
    [
      question('start', {
        question: 'Where to?',
        expectedAnswers: ['yes', 'no'],
        metadata: { channel: 'inbound' },
      }),
      action('action', { action: 'dispatch', parameters: { timeout: 30 } }),
      message('end', { message: 'Completed', severity: 'info' }),
    ],
    [edge('start', 'action', 'yes'), edge('start', 'end', 'no'), edge('action', 'end')],
    { id: 'sample-flow', name: 'Sample flow', metadata: { owner: 'data-team', version: 1 } }
  );
}

export const SAMPLE_DOCUMENT = [
  'id: sample-flow',
  'name: Sample flow',
  'metadata:',
  '  owner: data-team',
  '  version: 1',
  'flow:',
  '  start:',
  '    type: question',
  '    question: Where to?',
  '    expected_answers:',
  '      - yes',
  '      - no',
  '    next:',
  '      yes: action',
  '      no: end',
  '    metadata:',
  '      channel: inbound',
  '  action:',
  '    type: action',
  '    action: dispatch',
  '    parameters:',
  '      timeout: 30',
  '    next: end',
  '  end:',
  '    type: message',
  '    message: Completed',
  '    severity: info',
  '',
].join('\n');

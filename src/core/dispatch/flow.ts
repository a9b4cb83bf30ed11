import type { ArchiveLookup, ArchiveOp } from '../../ports/ArchivePort.js';
import type { ContextPatch, ConversationSnapshot } from '../../ports/ConversationStore.js';
import type { MemberStatus, Update } from '../../ports/Update.js';
import { RoutingConfigError } from '../../utils/errors.js';

export interface Reply {
  text: string;
  /** Defaults to the chat the update came from. */
  chatId?: string;
  replyTo?: number;
}

export interface HandlerInput {
  update: Update;
  snapshot: ConversationSnapshot;
  lookup: ArchiveLookup;
}

export interface HandlerEffects {
  contextPatch?: ContextPatch;
  replies?: Reply[];
  archive?: ArchiveOp[];
}

/** Pure given its input: everything it reads arrives in `HandlerInput`. */
export type Handler = (input: HandlerInput) => HandlerEffects;

export type InputPattern =
  | { kind: 'text'; match?: RegExp }
  | { kind: 'callback'; match?: string | RegExp }
  | { kind: 'any' };

export interface CommandRoute<S extends string> {
  description: string;
  /** State after the command; the current state is kept when omitted. */
  next?: S;
  /** Only chat creators and administrators may run it. */
  adminOnly?: boolean;
  handle: Handler;
}

export interface TransitionRule<S extends string> {
  on: InputPattern;
  next: S;
  handle?: Handler;
}

export interface FlowDefinition<S extends string> {
  states: readonly S[];
  /** Rest state; new conversations start here and finished flows return here. */
  idle: S;
  commands: Readonly<Record<string, CommandRoute<S>>>;
  transitions: Readonly<Partial<Record<S, readonly TransitionRule<S>[]>>>;
  /** Unrecognized input. Only its replies are used; it never changes state. */
  fallback: Handler;
  /** Answers an admin-only command sent by anyone else; the fallback when omitted. Never changes state. */
  forbidden?: Handler;
  /** Someone's membership of the chat changed. Never changes state. */
  onMemberChange?: Handler;
  /** Archive writes derived from every update, whichever route handles it. */
  observe?: (update: Update) => ArchiveOp[];
}

export interface Flow<S extends string = string> extends FlowDefinition<S> {
  hasState(state: string): state is S;
}

const COMMAND_TOKEN = /^[a-z0-9_]{1,32}$/;

/**
 * Validates a flow table. Unknown target states, an undeclared idle state and
 * malformed command tokens are configuration errors raised here, at startup.
 */
export function defineFlow<S extends string>(definition: FlowDefinition<S>): Flow<S> {
  const problems: string[] = [];
  const declared = new Set<string>();

  if (definition.states.length === 0) {
    problems.push('states: at least one state is required');
  }
  for (const state of definition.states) {
    if (declared.has(state)) {
      problems.push(`states: "${state}" is declared twice`);
    }
    declared.add(state);
  }
  if (!declared.has(definition.idle)) {
    problems.push(`idle: "${definition.idle}" is not a declared state`);
  }

  for (const [token, route] of Object.entries(definition.commands)) {
    if (!COMMAND_TOKEN.test(token)) {
      problems.push(`commands: "${token}" must be 1-32 characters of a-z, 0-9 or _`);
    }
    if (route.next !== undefined && !declared.has(route.next)) {
      problems.push(`commands.${token}: target state "${route.next}" is not declared`);
    }
  }

  for (const [from, rules] of Object.entries(definition.transitions)) {
    if (!declared.has(from)) {
      problems.push(`transitions: source state "${from}" is not declared`);
    }
    if (!Array.isArray(rules)) {
      continue;
    }
    rules.forEach((rule: TransitionRule<S>, index: number) => {
      if (!declared.has(rule.next)) {
        problems.push(`transitions.${from}[${index}]: target state "${rule.next}" is not declared`);
      }
    });
  }

  if (problems.length > 0) {
    throw new RoutingConfigError(problems);
  }

  return {
    ...definition,
    hasState: (state: string): state is S => declared.has(state),
  };
}

export function isAdminStatus(status: MemberStatus | undefined): boolean {
  return status === 'creator' || status === 'administrator';
}

export function matchesPattern(pattern: InputPattern, update: Update): boolean {
  const { payload } = update;
  switch (pattern.kind) {
    case 'any':
      return payload.kind === 'text' || payload.kind === 'callback' || payload.kind === 'command';
    case 'text':
      return payload.kind === 'text' && (pattern.match === undefined || pattern.match.test(payload.text));
    case 'callback':
      if (payload.kind !== 'callback') return false;
      if (pattern.match === undefined) return true;
      return typeof pattern.match === 'string' ? payload.data === pattern.match : pattern.match.test(payload.data);
  }
}

/**
 * Webhook renderers
 *
 * Each renderer turns one validated GitHub payload into chat lines. They are
 * pure apart from warning logs: the same payload and context always give the
 * same lines.
 */

import type { z } from 'zod';
import { createLogger } from '../../utils/logger.js';
import { NAME, VERSION, describeRuntime } from '../../version.js';
import { alert, bold, firstLine, sanitizeLine } from './format.js';
import {
  issuesPayloadSchema,
  pingPayloadSchema,
  pullRequestPayloadSchema,
  pushPayloadSchema,
  type PullRequestPayload,
  type PushCommit,
} from './schemas.js';
import type { RenderContext, RenderResult } from './types.js';

const logger = createLogger('Renderer');

const ISSUE_ACTIONS = new Set(['opened', 'deleted', 'closed', 'reopened']);
const UNKNOWN_REF_PART = '<unknown>';
const UNKNOWN_PING_TARGET = '?UNKNOWN?';
const SHORT_SHA_LENGTH = 7;

/** Tag moved by the nightly release job on every successful build */
export const NIGHTLY_TAG = 'last-successful';

type ParseResult<T> = { ok: true; data: T } | { ok: false; result: RenderResult };

function parsePayload<S extends z.ZodTypeAny>(
  eventName: string,
  schema: S,
  payload: unknown
): ParseResult<z.infer<S>> {
  const result = schema.safeParse(payload);
  if (result.success) {
    return { ok: true, data: result.data };
  }

  const details = result.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
  logger.warn(`Malformed ${eventName} payload, skipping: ${details}`);
  return { ok: false, result: { kind: 'skipped', reason: `malformed ${eventName} payload` } };
}

function lines(...rendered: string[]): RenderResult {
  return { kind: 'lines', lines: rendered.map((line) => sanitizeLine(line)) };
}

export function renderIssues(payload: unknown): RenderResult {
  const parsed = parsePayload('issues', issuesPayloadSchema, payload);
  if (!parsed.ok) return parsed.result;
  const event = parsed.data;

  if (!ISSUE_ACTIONS.has(event.action)) {
    return { kind: 'skipped', reason: `issue action "${event.action}" is not announced` };
  }

  return lines(
    `${bold(event.sender.login)} has ${event.action} issue #${event.issue.number} ` +
    `(${event.issue.title}) on ${event.repository.full_name}: ${event.issue.html_url}`
  );
}

export function renderPing(payload: unknown, context: RenderContext): RenderResult {
  const parsed = parsePayload('ping', pingPayloadSchema, payload);
  if (!parsed.ok) return parsed.result;
  const event = parsed.data;

  const target = event.organization?.login ?? event.repository?.full_name ?? UNKNOWN_PING_TARGET;
  const rendered = [`${bold('GitHub')} has pinged ${target}`];
  if (context.announceRuntime) {
    rendered.push(`I'm ${NAME} v${VERSION}, running on ${describeRuntime()}`);
  }
  return lines(...rendered);
}

function describePullRequestAction(event: PullRequestPayload): string | null {
  const subject = `pull request #${event.number} (${event.pull_request.title})`;
  switch (event.action) {
    case 'opened':
      return `opened ${subject}`;
    case 'closed':
      return `${event.pull_request.merged ? 'merged' : 'closed'} ${subject}`;
    case 'ready_for_review':
      return `marked ${subject} ready for review`;
    case 'reopened':
      return `reopened ${subject}`;
    default:
      return null;
  }
}

export function renderPullRequest(payload: unknown): RenderResult {
  const parsed = parsePayload('pull_request', pullRequestPayloadSchema, payload);
  if (!parsed.ok) return parsed.result;
  const event = parsed.data;

  const action = describePullRequestAction(event);
  if (action === null) {
    return { kind: 'skipped', reason: `pull request action "${event.action}" is not announced` };
  }

  return lines(
    `${bold(event.sender.login)} has ${action} on ${event.repository.full_name}: ` +
    `${event.pull_request.html_url}`
  );
}

export interface ParsedRef {
  refType: string;
  refName: string;
}

/**
 * Split `refs/<type>/<name>`. Anything else (including branch names that
 * contain a slash) yields placeholder parts instead of an error.
 */
export function parseRef(ref: string): ParsedRef {
  const parts = ref.split('/');
  if (parts.length !== 3) {
    logger.warn(`Unexpected ref in push event '${ref}'`);
    return { refType: UNKNOWN_REF_PART, refName: UNKNOWN_REF_PART };
  }
  return { refType: parts[1], refName: parts[2] };
}

function describeCommit(commit: PushCommit): string {
  return `${commit.author.name} ${commit.id.slice(0, SHORT_SHA_LENGTH)} ${firstLine(commit.message)}`;
}

export function renderPush(payload: unknown, context: RenderContext): RenderResult {
  const parsed = parsePayload('push', pushPayloadSchema, payload);
  if (!parsed.ok) return parsed.result;
  const event = parsed.data;

  const { refType, refName } = parseRef(event.ref);
  if (refType === 'tags' && refName === NIGHTLY_TAG) {
    return { kind: 'skipped', reason: `tag ${NIGHTLY_TAG} is not announced` };
  }

  const author = bold(event.sender.login);
  const repo = event.repository.full_name;
  const numCommits = event.commits.length;
  const pushType = event.forced ? alert('force-pushed') : 'pushed';
  const refPath = refType === 'heads' || refType === 'tags' ? `${repo}/${refName}` : repo;

  if (refType === 'heads' && !event.deleted) {
    const noun = numCommits === 1 ? 'commit' : 'commits';
    let summary: string;
    if (numCommits > 0) {
      const compare = event.compare ? `: ${event.compare}` : '';
      summary = `${author} has ${pushType} ${numCommits} ${noun} to ${refPath}${compare}`;
    } else {
      summary = `${author} has ${pushType} to ${refPath}`;
    }

    const details = numCommits <= context.maxCommitsPerEvent
      ? event.commits.map(describeCommit)
      : [];
    return lines(summary, ...details);
  }

  if (event.deleted) {
    return lines(`${author} has deleted ${refPath}`);
  }

  if (refType === 'tags') {
    return lines(
      `${author} has ${pushType} tag ${refName} to ${refPath}: ` +
      `${event.repository.html_url}/releases/tag/${refName}`
    );
  }

  logger.warn(`Unhandled push notification for ${event.ref}`);
  return { kind: 'unsupported', reason: `push to unsupported ref ${event.ref}` };
}

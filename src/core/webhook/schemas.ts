/**
 * The subset of each GitHub payload the renderers read. Anything not listed
 * here is ignored; anything listed and missing fails validation.
 */

import { z } from 'zod';

const senderSchema = z.object({
  login: z.string(),
});

const repositorySchema = z.object({
  full_name: z.string(),
});

export const issuesPayloadSchema = z.object({
  action: z.string(),
  issue: z.object({
    number: z.number().int(),
    title: z.string(),
    html_url: z.string(),
  }),
  sender: senderSchema,
  repository: repositorySchema,
});

export const pingPayloadSchema = z.object({
  organization: z.object({ login: z.string() }).optional(),
  repository: z.object({ full_name: z.string() }).optional(),
});

export const pullRequestPayloadSchema = z.object({
  action: z.string(),
  number: z.number().int(),
  pull_request: z.object({
    title: z.string(),
    html_url: z.string(),
    merged: z.boolean().nullable().optional(),
  }),
  sender: senderSchema,
  repository: repositorySchema,
});

export const pushCommitSchema = z.object({
  id: z.string(),
  message: z.string(),
  author: z.object({
    name: z.string(),
  }),
});

export const pushPayloadSchema = z.object({
  ref: z.string(),
  forced: z.boolean(),
  deleted: z.boolean(),
  compare: z.string().optional(),
  commits: z.array(pushCommitSchema),
  sender: senderSchema,
  repository: repositorySchema.extend({
    html_url: z.string(),
  }),
});

export type IssuesPayload = z.infer<typeof issuesPayloadSchema>;
export type PingPayload = z.infer<typeof pingPayloadSchema>;
export type PullRequestPayload = z.infer<typeof pullRequestPayloadSchema>;
export type PushPayload = z.infer<typeof pushPayloadSchema>;
export type PushCommit = z.infer<typeof pushCommitSchema>;

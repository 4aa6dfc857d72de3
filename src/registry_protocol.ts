// src/registry_protocol.ts

import { z } from "zod";

const name = z.string().trim().min(1);

export const instanceAddressSchema = z.object({
  host: z.string().trim().min(1),
  port: z.number().int().min(1).max(65535),
  protocol: z.enum(["http", "https"]).optional(),
});

export const registerMessageSchema = z.object({
  type: z.literal("registry:register"),
  serviceName: name,
  instanceId: name.optional(),
  address: instanceAddressSchema,
  metadata: z.record(z.string()).optional(),
});

export const renewMessageSchema = z.object({
  type: z.literal("registry:renew"),
  serviceName: name,
  instanceId: name,
});

export const deregisterMessageSchema = z.object({
  type: z.literal("registry:deregister"),
  serviceName: name,
  instanceId: name,
});

export const resolveMessageSchema = z.object({
  type: z.literal("registry:resolve"),
  serviceName: name,
});

export const servicesMessageSchema = z.object({
  type: z.literal("registry:services"),
});

export const registryRequestSchema = z.discriminatedUnion("type", [
  registerMessageSchema,
  renewMessageSchema,
  deregisterMessageSchema,
  resolveMessageSchema,
  servicesMessageSchema,
]);

export type RegistryRequest = z.infer<typeof registryRequestSchema>;
export type RegisterMessage = z.infer<typeof registerMessageSchema>;

export const instanceRecordSchema = z.object({
  serviceName: z.string(),
  instanceId: z.string(),
  address: instanceAddressSchema,
  status: z.enum(["UP", "DOWN"]),
  lastRenewalAt: z.number(),
  registeredAt: z.number(),
  metadata: z.record(z.string()),
});

export const instanceViewSchema = z.object({
  instanceId: z.string(),
  address: instanceAddressSchema,
  status: z.enum(["UP", "DOWN"]),
});

export const serviceSummarySchema = z.object({
  serviceName: z.string(),
  up: z.number(),
  total: z.number(),
});

export type RegistryErrorCode = "NOT_FOUND" | "INVALID_REQUEST" | "INTERNAL";

export const failureReplySchema = z.object({
  ok: z.literal(false),
  code: z.enum(["NOT_FOUND", "INVALID_REQUEST", "INTERNAL"]),
  message: z.string(),
});

export type FailureReply = z.infer<typeof failureReplySchema>;

/**
 * Builds the schema of a reply that is either `{ ok: true, ...success }`
 * or a failure reply.
 */
export function replySchema<T extends z.ZodRawShape>(success: T) {
  return z.union([z.object({ ok: z.literal(true) }).extend(success), failureReplySchema]);
}

export const instanceReplySchema = replySchema({ instance: instanceRecordSchema });
export const deregisterReplySchema = replySchema({ removed: z.boolean() });
export const resolveReplySchema = replySchema({ instances: z.array(instanceViewSchema) });
export const servicesReplySchema = replySchema({ services: z.array(serviceSummarySchema) });

export function failure(code: RegistryErrorCode, message: string): FailureReply {
  return { ok: false, code, message };
}

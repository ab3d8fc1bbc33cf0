import { z } from "zod";

const contextScalar = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const requestContextSchema = z.record(
  z.union([contextScalar, z.array(contextScalar)]),
);

export const authorizeSchema = z.object({
  body: z.object({
    principalId: z.string().min(1),
    resource: z.string().min(1),
    action: z.string().min(1),
    context: requestContextSchema.nullish(),
  }),
});

export const permissionCheckSchema = z.object({
  params: z.object({
    id: z.string().min(1),
    resource: z.string().min(1),
    action: z.string().min(1),
  }),
});

export const principalPermissionsSchema = z.object({
  params: z.object({
    id: z.string().min(1),
  }),
});

export const relationshipCheckSchema = z.object({
  params: z.object({
    id: z.string().min(1),
    targetId: z.string().min(1),
    type: z.string().min(1),
  }),
});


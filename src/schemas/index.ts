import { z } from "zod";

// Registries and push tools write absent fields as null as often as they omit them
function absentAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

const AnnotationsSchema = absentAsUndefined(z.record(z.string(), z.string()));

// OCI content descriptor (config and layers of a manifest)
export const OciDescriptorSchema = z.object({
  mediaType: z.string(),
  digest: z.string().min(1),
  size: z.number().int().nonnegative(),
  annotations: AnnotationsSchema,
  artifactType: absentAsUndefined(z.string()),
});

// OCI image manifest. Only the fields the loader reads are declared.
export const OciManifestSchema = z.object({
  schemaVersion: z.literal(2),
  mediaType: absentAsUndefined(z.string()),
  artifactType: absentAsUndefined(z.string()),
  config: OciDescriptorSchema,
  layers: z
    .array(OciDescriptorSchema)
    .nullish()
    .transform((layers) => layers ?? []),
  annotations: AnnotationsSchema,
});

// Per-host entry in registries.yaml
export const RegistrySettingsEntrySchema = z.object({
  http: z.boolean().default(false),
  mirrors: z.array(z.string().min(1)).default([]),
});
export type RegistrySettingsEntry = z.infer<typeof RegistrySettingsEntrySchema>;

// registries.yaml
export const RegistrySettingsFileSchema = z.object({
  registries: z.record(z.string(), RegistrySettingsEntrySchema).default({}),
});
export type RegistrySettings = z.infer<typeof RegistrySettingsFileSchema>;

// One entry of "auths" in the registry credentials file (config.json)
export const RegistryAuthEntrySchema = z.object({
  auth: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  identitytoken: z.string().optional(),
  registrytoken: z.string().optional(),
});
export type RegistryAuthEntry = z.infer<typeof RegistryAuthEntrySchema>;

// Registry credentials file; other top-level keys are ignored
export const RegistryCredentialsFileSchema = z.object({
  auths: z.record(z.string(), RegistryAuthEntrySchema).default({}),
});
export type RegistryCredentialsFile = z.infer<typeof RegistryCredentialsFileSchema>;

// Token endpoint response (either field name is in use)
export const TokenResponseSchema = z
  .object({
    token: z.string().optional(),
    access_token: z.string().optional(),
  })
  .transform((data) => data.token ?? data.access_token);

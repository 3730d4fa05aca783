import { z } from "zod";
import { RISK_LEVELS } from "./risk.js";

const riskLevelSchema = z.enum(RISK_LEVELS);

/** Kernel variant as written in config.yaml or a variant definition file. */
export const variantDefinitionSchema = z.object({
  name: z.string().min(1),
  display_name: z.string().min(1),
  kernel_package: z.string().min(1),
  headers_package: z.string().min(1),
  precompiled_package: z.string().min(1).nullable().optional(),
  supports_precompiled: z.boolean().optional(),
  is_default: z.boolean().optional(),
});

export type VariantDefinition = z.infer<typeof variantDefinitionSchema>;

/** Full server configuration. */
export const pluginConfigSchema = z.object({
  privilege: z.object({
    use_sudo: z.boolean(),
  }),
  packages: z.object({
    utils: z.string().min(1),
    dkms: z.string().min(1),
    module_family_prefixes: z.array(z.string().min(1)),
  }),
  sources: z.object({
    binary_db_url: z.string().url(),
    release_api_base: z.string().url(),
    release_tag_prefix: z.string(),
    precompiled_source: z.enum(["repository", "release"]),
  }),
  catalog: z.object({
    auto_detect: z.boolean(),
    variant_paths: z.array(z.string()),
    variants: z.array(variantDefinitionSchema),
    disabled: z.array(z.string()),
  }),
  scanner: z.object({
    filter_kernels: z.boolean(),
    refresh_index: z.boolean(),
  }),
  errors: z.object({
    command_timeout_ceiling: z.number().int().min(0),
  }),
  safety: z.object({
    confirmation_threshold: riskLevelSchema,
    dry_run_bypass_confirmation: z.boolean(),
  }),
});

export type PluginConfig = z.infer<typeof pluginConfigSchema>;

import { z } from "zod";
import { isSelector } from "../descriptors";

export const contractEntrySchema = z.object({
  chainId: z.number().int().nonnegative(),
  type: z.string().min(1),
  addresses: z.array(z.string().min(1)).min(1),
});

export const signatureDatabaseSchema = z.record(
  z.string().refine(isSelector, { message: "Expected a 4-byte 0x selector" }),
  z.array(z.string().min(1))
);

export const settingsConfigSchema = z.object({
  version: z.literal("1.0"),
  descriptorDirs: z.array(z.string().min(1)).optional().default([]),
  signatures: signatureDatabaseSchema.optional().default({}),
  contracts: z.array(contractEntrySchema).optional().default([]),
  disabledVisualizers: z.array(z.string()).optional().default([]),
});

export type ContractEntry = z.infer<typeof contractEntrySchema>;
export type SignatureDatabase = z.infer<typeof signatureDatabaseSchema>;
export type SettingsConfig = z.infer<typeof settingsConfigSchema>;
/** Settings as written by hand: every field but `version` may be omitted. */
export type SettingsInput = z.input<typeof settingsConfigSchema>;

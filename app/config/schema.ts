import { z } from 'zod';

/**
 * Zod schema for taskmint configuration validation
 */

export const logLevelSchema = z.enum(['debug', 'verbose', 'info', 'warn', 'error']);

export const executorSelectorSchema = z.union([
  z.literal('all'),
  z.array(z.string().min(1)).min(1),
]);

export const taskDefaultsSchema = z.object({
  cache: z.boolean().default(false),
  executors: executorSelectorSchema.default('all'),
  walltimeSeconds: z.number().positive().default(60),
  auxiliaryFiles: z.array(z.string().min(1)).default([]),
});

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  timestamps: z.boolean().default(true),
});

export const appConfigSchema = z.object({
  registryName: z.string().min(1).max(100).default('default'),
  tasks: taskDefaultsSchema.default({}),
  logging: loggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type TaskDefaultsConfig = z.infer<typeof taskDefaultsSchema>;
export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

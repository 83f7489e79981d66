/**
 * Workflow template document format
 *
 * ```yaml
 * templates:
 *   - name: security_audit
 *     title: Security audit
 *     steps:
 *       - id: audit
 *         unit: security_auditor
 *         args: { mode: audit }
 *       - id: ports
 *         unit: network_monitor
 *         dependsOn: [audit]
 * ```
 *
 * @module workflow
 */

import { z } from 'zod';
import { StepMode } from '../types/core-types.js';

const ArgValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const StepSchema = z.object({
  id: z
    .string()
    .min(1)
    .regex(/^[a-zA-Z0-9_-]+$/, 'step ids may only contain letters, digits, "_" and "-"'),
  unit: z.string().min(1),
  args: z.record(ArgValueSchema).default({}),
  mode: z.nativeEnum(StepMode).default(StepMode.SEQUENTIAL),
  role: z.string().optional(),
  dependsOn: z.array(z.string()).default([]),
});

export const TemplateSchema = z.object({
  name: z
    .string()
    .min(1)
    .regex(/^[a-zA-Z0-9_-]+$/, 'template names may only contain letters, digits, "_" and "-"'),
  title: z.string().min(1),
  description: z.string().optional(),
  steps: z.array(StepSchema).min(1, 'a template needs at least one step'),
});

export const TemplateDocumentSchema = z.object({
  templates: z.array(z.unknown()),
});

export type TemplateInput = z.input<typeof TemplateSchema>;

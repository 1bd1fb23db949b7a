/**
 * Machine state documents
 *
 * One JSON document per machine in the shared state directory, written
 * wholesale by its owner and only read by everyone else.
 */

import { z } from 'zod';

const IsoTimestamp = z.string().refine(value => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO-8601 timestamp',
});

export const ProjectSummarySchema = z.object({
  id: z.string(),
  title: z.string(),
  oneLiner: z.string(),
  kind: z.string(),
  categories: z.array(z.string()),
  tags: z.array(z.string()),
  status: z.enum(['active', 'archived', 'unknown']),
});

export const MachineActivityEntrySchema = z.object({
  localPath: z.string().nullable(),
  lastOpened: IsoTimestamp.nullable(),
  lastPushed: IsoTimestamp.nullable(),
  project: ProjectSummarySchema.optional(),
});

export const MachineStateDocumentSchema = z.object({
  version: z.literal(1),
  machineId: z.string().min(1),
  machineName: z.string(),
  lastSync: IsoTimestamp,
  repos: z.record(z.string(), MachineActivityEntrySchema),
});

export type ProjectSummary = z.infer<typeof ProjectSummarySchema>;
export type MachineActivityEntry = z.infer<typeof MachineActivityEntrySchema>;
export type MachineStateDocument = z.infer<typeof MachineStateDocumentSchema>;

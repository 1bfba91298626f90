/**
 * Control catalog: Types and record schema
 */
import { z } from 'zod';

export const ControlSchema = z.object({
  controlId: z.string().min(1),
  domain: z.string().min(1),
  title: z.string().min(1),
  requirement: z.string().min(1),
  assessmentObjective: z.string().min(1),
  discussion: z.string(),
  nistReference: z.string().min(1),
});

export type Control = Readonly<z.infer<typeof ControlSchema>>;

/** The subset of a control shown to the person answering. */
export interface ControlInfo {
  controlId: string;
  title: string;
  requirement: string;
  assessmentObjective: string;
}

export interface CatalogSummary {
  totalControls: number;
  domainCount: number;
  domains: Record<string, number>;
}

export function toControlInfo(control: Control): ControlInfo {
  return {
    controlId: control.controlId,
    title: control.title,
    requirement: control.requirement,
    assessmentObjective: control.assessmentObjective,
  };
}

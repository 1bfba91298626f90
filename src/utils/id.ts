import { v4 as uuidv4, validate, version } from 'uuid';

export function newAssessmentId(): string {
  return uuidv4();
}

/** True for the v4 UUIDs newAssessmentId hands out. */
export function isAssessmentId(value: string): boolean {
  return validate(value) && version(value) === 4;
}

import type { CompleteRequirements, Requirements } from '../workers/contracts.js';
import type { RequirementField } from '../types.js';

export const REQUIRED_FIELDS: readonly RequirementField[] = ['budget', 'location', 'bedrooms', 'bathrooms'];

function hasBudget(requirements: Requirements): boolean {
  const budget = requirements.budget;
  if (!budget) return false;
  return typeof budget.min === 'number' || typeof budget.max === 'number';
}

export function missingRequirements(requirements: Requirements): RequirementField[] {
  const missing: RequirementField[] = [];
  if (!hasBudget(requirements)) missing.push('budget');
  if (!requirements.location || requirements.location.trim().length === 0) missing.push('location');
  if (typeof requirements.bedrooms !== 'number') missing.push('bedrooms');
  if (typeof requirements.bathrooms !== 'number') missing.push('bathrooms');
  return missing;
}

export function isComplete(requirements: Requirements): requirements is CompleteRequirements {
  return missingRequirements(requirements).length === 0;
}

/** Later answers win field by field; budget bounds merge independently. */
export function mergeRequirements(current: Requirements, update: Requirements | undefined): Requirements {
  if (!update) return { ...current };

  const merged: Requirements = { ...current };
  if (update.location !== undefined) merged.location = update.location;
  if (update.bedrooms !== undefined) merged.bedrooms = update.bedrooms;
  if (update.bathrooms !== undefined) merged.bathrooms = update.bathrooms;
  if (update.propertyType !== undefined) merged.propertyType = update.propertyType;
  if (update.budget) {
    merged.budget = {
      ...current.budget,
      ...(update.budget.min !== undefined ? { min: update.budget.min } : {}),
      ...(update.budget.max !== undefined ? { max: update.budget.max } : {})
    };
  }
  return merged;
}

const FIELD_PROMPTS: Record<RequirementField, string> = {
  budget: 'your budget',
  location: 'the area you want to live in',
  bedrooms: 'how many bedrooms you need',
  bathrooms: 'how many bathrooms you need'
};

export function clarifyingQuestion(missing: readonly RequirementField[]): string {
  const prompts = missing.map((field) => FIELD_PROMPTS[field]);
  if (prompts.length === 0) return 'Could you tell me a little more about what you are looking for?';
  if (prompts.length === 1) return `Could you tell me ${prompts[0]}?`;
  const last = prompts[prompts.length - 1];
  return `Could you tell me ${prompts.slice(0, -1).join(', ')} and ${last}?`;
}

import { Check } from '../types.js';
import { connectivityCheck } from './connectivity.js';
import { datasetCheck } from './dataset.js';

export const allChecks: Check[] = [
  datasetCheck,
  connectivityCheck,
];

export const quickChecks = allChecks.filter(c => c.quick);

export function getChecksByName(names: string[]): Check[] {
  const lowered = names.map(n => n.toLowerCase());
  return allChecks.filter(c => lowered.includes(c.name.toLowerCase()));
}

export { connectivityCheck, datasetCheck };

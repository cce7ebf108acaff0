import type { Capability, ParameterSpec } from './models/intent';
import { humanizeParameter } from './utils/parameterUtils';

const CLAIM_STATUS_SUGGESTIONS = ['pending', 'approved', 'denied', 'in_review'];

export const DEFAULT_CAPABILITIES: Capability[] = [
  {
    name: 'query_patients',
    description: 'Search patients by name',
    requiredParameters: [{ name: 'patient_name', label: 'Patient name', type: 'string' }]
  },
  {
    name: 'get_claims',
    description: 'List the claims of a specific patient',
    requiredParameters: [{ name: 'patient_id', label: 'Patient', type: 'string' }],
    entityKinds: ['patient'],
    filterParameters: [
      { name: 'status', label: 'Claim status', type: 'array', suggestions: CLAIM_STATUS_SUGGESTIONS }
    ]
  },
  {
    name: 'calculate_total',
    description: 'Calculate the total amount of a set of claims',
    requiredParameters: [{ name: 'claim_ids', label: 'Claim IDs', type: 'array' }]
  },
  {
    name: 'export_claims',
    description: 'Export claims matching a filter',
    requiredParameters: [
      { name: 'count', label: 'Number of claims', type: 'number', defaultValue: 1000 }
    ],
    entityKinds: ['patient'],
    constraints: [{ name: 'export_size', parameter: 'count', max: 10000, label: 'export limit' }],
    filterParameters: [
      { name: 'status', label: 'Claim status', type: 'array', suggestions: CLAIM_STATUS_SUGGESTIONS },
      { name: 'date_range', label: 'Date range', type: 'string' }
    ],
    supportsAsync: true
  },
  {
    name: 'search_knowledge',
    description: 'Search the policy and procedure knowledge base',
    requiredParameters: [{ name: 'query', label: 'Search terms', type: 'string' }]
  }
];

export function findCapability(capabilities: readonly Capability[], name: string): Capability | undefined {
  return capabilities.find(capability => capability.name === name);
}

export function entityParameter(kind: string): string {
  return `${kind}_id`;
}

/**
 * Looks a parameter up on the given intent first, then across the catalog.
 * Unknown names get a plain text spec; `*_ids` names are lists.
 */
export function findParameterSpec(
  capabilities: readonly Capability[],
  intent: string,
  name: string
): ParameterSpec {
  const ordered = [
    ...capabilities.filter(capability => capability.name === intent),
    ...capabilities.filter(capability => capability.name !== intent)
  ];

  for (const capability of ordered) {
    const spec = [...capability.requiredParameters, ...(capability.filterParameters ?? [])].find(
      parameter => parameter.name === name
    );
    if (spec) return spec;
  }

  return {
    name,
    label: humanizeParameter(name),
    type: name.endsWith('_ids') ? 'array' : 'string'
  };
}

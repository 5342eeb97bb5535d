import serviceTypes from '../data/service-types.json';

export interface ServiceTypeDefinition {
  type: string;
  label: string;
  keywords: string[];
  durationHours: number;
  baseCost: number;
}

export const SERVICE_TYPES: ServiceTypeDefinition[] = serviceTypes;

export const DEFAULT_SERVICE_TYPE = 'scheduled_service';

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function phrasePattern(phrase: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, 'i');
}

export function getServiceType(type: string): ServiceTypeDefinition {
  return (
    SERVICE_TYPES.find((definition) => definition.type === type) ??
    SERVICE_TYPES.find((definition) => definition.type === DEFAULT_SERVICE_TYPE) ?? {
      type: DEFAULT_SERVICE_TYPE,
      label: 'Scheduled service',
      keywords: [],
      durationHours: 2,
      baseCost: 500,
    }
  );
}

/** First catalogue entry (in catalogue order) with a keyword in the text. */
export function matchServiceType(text: string): ServiceTypeDefinition | null {
  for (const definition of SERVICE_TYPES) {
    if (definition.keywords.some((keyword) => phrasePattern(keyword).test(text))) {
      return definition;
    }
  }
  return null;
}

export function formatDuration(hours: number): string {
  if (hours < 1) return `${Math.round(hours * 60)} minutes`;
  if (hours === 1) return '1 hour';
  return `${hours} hours`;
}

import { DateTime } from 'luxon';
import { ServiceProvider, VehicleListing } from '../types/capabilities';
import { AcquisitionSlots, ConsignmentSlots, DomainSlots, ServiceSlots, SessionStage } from '../types/session';
import { formatGBP, formatNumber } from './format';
import { SERVICE_TYPES } from './serviceTypes';

export const GREETING_REPLY =
  'Hello! I can help you find and buy a vehicle, book a service for your car, or sell your car with us. What can I do for you today?';

export const CLARIFY_REPLY =
  "Sorry, I'm not sure what you need. Are you looking to buy a vehicle, book a service, or sell your car?";

export const RETRY_REPLY = "Sorry, something went wrong on our side and I couldn't save that. Please send your last message again.";

/** "a", "a and b", "a, b and c" */
export function joinLabels(labels: string[]): string {
  const lower = labels.map((label) => label.toLowerCase());
  if (lower.length <= 1) return lower.join('');
  return `${lower.slice(0, -1).join(', ')} and ${lower[lower.length - 1]}`;
}

export function incompleteReply(missingFields: string[]): string {
  return `Nearly there. Before I can finish I still need: ${missingFields.join(', ')}.`;
}

function describeListing(listing: VehicleListing): string {
  const parts = [`${listing.year} ${listing.make} ${listing.model}`, formatGBP(listing.price, true)];
  if (listing.mileage !== undefined) parts.push(`${formatNumber(listing.mileage)} miles`);
  if (listing.location) parts.push(listing.location);
  return parts.join(', ');
}

function describeProvider(provider: ServiceProvider): string {
  const kind = provider.tier === 1 ? 'official' : 'specialist';
  return `${provider.name} (${kind}), ${provider.location}, rated ${provider.rating}, ${provider.distanceMiles} miles away, from ${formatGBP(provider.estimatedCost, true)}`;
}

function numbered(lines: string[]): string {
  return lines.map((line, index) => `${index + 1}. ${line}`).join('\n');
}

function acquisitionDraft(slots: AcquisitionSlots, stage: SessionStage, labels: string[]): string {
  const wanted = [slots.criteria.make, slots.criteria.model].filter(Boolean).join(' ');

  switch (stage) {
    case 'vehicle_search':
      return wanted
        ? `I couldn't find any ${wanted} available right now. Is there another make or model I can look for?`
        : 'Which make or model are you looking for?';
    case 'vehicle_selection': {
      const count = slots.searchResults.length;
      const intro = count === 1 ? `I found one ${wanted}:` : `I found ${count} vehicles matching ${wanted}:`;
      const ask = count === 1 ? 'Would you like to reserve it?' : 'Which one would you like? Just reply with its number.';
      return [intro, numbered(slots.searchResults.map(describeListing)), ask].join('\n');
    }
    case 'customer_info': {
      const lines: string[] = [];
      if (slots.selectedVehicle) lines.push(`Great choice: ${describeListing(slots.selectedVehicle)}.`);
      if (slots.financeQuote) {
        const quote = slots.financeQuote;
        lines.push(
          `On ${quote.productName} that works out at ${formatGBP(quote.monthlyPayment)} a month over ${quote.termMonths} months after a ${formatGBP(quote.deposit, true)} deposit.`
        );
      }
      lines.push(`To reserve it I just need your ${joinLabels(labels)}.`);
      return lines.join('\n');
    }
    default:
      return 'Thanks, I have everything I need for your order.';
  }
}

function serviceDraft(slots: ServiceSlots, stage: SessionStage, labels: string[]): string {
  const car = [slots.vehicle.make, slots.vehicle.model].filter(Boolean).join(' ') || 'car';

  switch (stage) {
    case 'vehicle_details':
      return `Happy to book that in. Could you tell me your vehicle's ${joinLabels(labels)}?`;
    case 'service_type': {
      const options = SERVICE_TYPES.map((definition) => definition.label.toLowerCase());
      return `What does your ${car} need? For example: ${options.join(', ')}.`;
    }
    case 'customer_details':
      return `Thanks. To find a provider near you I need your ${joinLabels(labels)}.`;
    case 'provider_selection':
      if (slots.providers.length === 0) {
        return `I couldn't find a provider for your ${car} near ${slots.contact.postcode ?? 'you'}. Could you give me a different postcode?`;
      }
      return [
        `Here are the best providers for your ${car}:`,
        numbered(slots.providers.map(describeProvider)),
        'Which one would you like? Just reply with its number.',
      ].join('\n');
    case 'appointment_datetime': {
      const provider = slots.selectedProvider ? ` with ${slots.selectedProvider.name}` : '';
      const ask = `What date and time would suit you for the appointment${provider}?`;
      const rejected = slots.rejectedDateTime;
      if (!rejected) return ask;

      const suggestion = rejected.suggestion ? DateTime.fromISO(rejected.suggestion, { setZone: true }) : null;
      const next = suggestion?.isValid ? ` The next opening is ${suggestion.toFormat("cccc d LLLL 'at' HH:mm")}.` : '';
      return `Sorry, ${rejected.reason}.${next} ${ask}`;
    }
    default:
      return 'Thanks, I have everything I need for your booking.';
  }
}

function consignmentDraft(slots: ConsignmentSlots, stage: SessionStage, labels: string[]): string {
  const lines: string[] = [];

  if (slots.valuation && (stage === 'sale_reason' || stage === 'owner_details')) {
    const { tradeIn, privateSale, retail } = slots.valuation;
    lines.push(
      `Based on its age and mileage we estimate: trade-in ${formatGBP(tradeIn, true)}, private sale ${formatGBP(privateSale, true)}, retail ${formatGBP(retail, true)}.`
    );
  }

  switch (stage) {
    case 'vehicle_details':
      lines.push(`Happy to help you sell it. What is the car's ${joinLabels(labels)}?`);
      break;
    case 'vehicle_condition':
      lines.push(`Thanks. What is its ${joinLabels(labels)}?`);
      break;
    case 'sale_reason':
      lines.push('What is your reason for selling?');
      break;
    case 'owner_details':
      lines.push(`To create the listing I need your ${joinLabels(labels)}.`);
      break;
    default:
      lines.push('Thanks, I have everything I need for your listing.');
  }

  return lines.join('\n');
}

/** Deterministic reply for the funnel's position. Used as-is when no language model is available. */
export function draftReply(slots: DomainSlots, stage: SessionStage, missingLabels: string[]): string {
  switch (slots.domain) {
    case 'acquisition':
      return acquisitionDraft(slots, stage, missingLabels);
    case 'service':
      return serviceDraft(slots, stage, missingLabels);
    case 'consignment':
      return consignmentDraft(slots, stage, missingLabels);
  }
}

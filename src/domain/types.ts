export const CONTRACT_FIELDS = [
  'sales_rep',
  'customer_name',
  'phone',
  'address',
  'equipment',
  'sale_price',
  'financing_by',
  'contract_date',
  'lead_po',
] as const;

export type ContractField = (typeof CONTRACT_FIELDS)[number];

export const NORMALIZER_KINDS = ['text', 'phone', 'currency', 'code', 'equipment'] as const;

export type NormalizerKind = (typeof NORMALIZER_KINDS)[number];

export interface ExtractedField {
  value: string;
  confidence: number;
  /** Id of the rule candidate that produced the value. */
  candidate: string;
}

export type ContractFields = Partial<Record<ContractField, ExtractedField>>;

export interface ContractRecord {
  documentId: string;
  sourceRef: string;
  fields: ContractFields;
}

export interface PatternCandidate {
  id: string;
  pattern: string;
  flags?: string;
  template?: string;
  confidence?: number;
}

export interface ExtractionRule {
  field: ContractField;
  normalize: NormalizerKind;
  candidates: PatternCandidate[];
  exclude?: string[];
}

export interface ExtractionRuleSet {
  version: 1;
  rules: ExtractionRule[];
  required: ContractField[];
  requiredAnyOf: ContractField[][];
  equipmentAliases: Record<string, string[]>;
}

export interface RepresentativeIdentity {
  name: string;
  ledgerId: string;
  aliases: string[];
}

export interface RepresentativeRegistry {
  representatives: readonly RepresentativeIdentity[];
}

export type MatchResult =
  | {
      status: 'matched';
      identity: RepresentativeIdentity;
      confidence: number;
      matchedName: string;
    }
  | {
      status: 'unmatched';
      bestCandidate: RepresentativeIdentity | null;
      confidence: number;
    };

export interface ProcessedEntry {
  documentId: string;
  sourceRef: string;
  processedAt: Date;
}

export interface SourceMetadata {
  name: string;
  sourceRef: string;
}

export interface LeadRequest {
  firstName: string;
  lastName: string;
  phone: string;
  address: string;
  city: string;
  state: string;
  zipCode: string;
  storeId: string;
  email?: string;
  appointmentDate?: string;
  appointmentTime?: string;
}

export interface LeadResult {
  orderNumber: string;
  serviceCenterId: string;
  customerName: string;
  appointment: string;
  /** Lookups made for the id; 0 when an existing lead was reused. */
  attempts: number;
  reused: boolean;
}

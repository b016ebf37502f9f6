// Types for the Utah disclosure pipeline

import type { Decimal } from 'decimal.js';

/** Calendar date as ISO `YYYY-MM-DD`. */
export type IsoDate = string;

/** Label → value pairs found on a page, kept even when not modeled explicitly. */
export type RawMetadata = Map<string, string>;

export interface ContributionRecord {
  date: IsoDate | null;
  dateRaw: string;
  contributorName: string;
  address: string;
  amount: Decimal;
  isInKind: boolean;
  isLoan: boolean;
  isAmendment: boolean;
}

export interface ExpenditureRecord {
  date: IsoDate | null;
  dateRaw: string;
  recipientName: string;
  purpose: string;
  location: string;
  amount: Decimal;
  isInKind: boolean;
  isLoan: boolean;
  isAmendment: boolean;
}

export interface ReportPeriod {
  reportType: string;
  beginDate: IsoDate | null;
  endDate: IsoDate | null;
  dueDate: IsoDate | null;
  submitDate: IsoDate | null;
}

export interface ParsedReport extends ReportPeriod {
  reportId: string;
  sourceUrl: string;
  title: string;
  organizationName: string;
  organizationType: string;
  balanceBeginning: Decimal;
  totalContributions: Decimal;
  totalExpenditures: Decimal;
  balanceEnding: Decimal;
  contributions: ContributionRecord[];
  expenditures: ExpenditureRecord[];
  rawMetadata: RawMetadata;
  warnings: string[];
}

export interface ParsedLobbyistReport extends ReportPeriod {
  reportId: string;
  sourceUrl: string;
  title: string;
  principalName: string;
  principalPhone: string;
  principalStreetAddress: string;
  principalCity: string;
  principalState: string;
  principalZip: string;
  totalExpenditures: Decimal;
  expenditures: ExpenditureRecord[];
  rawMetadata: RawMetadata;
  warnings: string[];
}

export interface PostalAddress {
  streetAddress: string;
  city: string;
  state: string;
  zipCode: string;
}

export interface ParsedOfficer extends PostalAddress {
  name: string;
  title: string;
  occupation: string;
  phone: string;
  email: string;
  suitePoBox: string;
  order: number;
  isTreasurer: boolean;
}

export interface ParsedEntity extends PostalAddress {
  entityId: string;
  sourceUrl: string;
  name: string;
  alsoKnownAs: string;
  entityType: string;
  status: string;
  dateCreated: IsoDate | null;
  suitePoBox: string;
  rawMetadata: RawMetadata;
  officers: ParsedOfficer[];
}

export interface ParsedPrincipal {
  name: string;
  contact: string;
  phone: string;
  address: string;
  order: number;
}

export interface ParsedLobbyistEntity extends PostalAddress {
  entityId: string;
  sourceUrl: string;
  firstName: string;
  lastName: string;
  name: string;
  phone: string;
  registrationDate: IsoDate | null;
  organizationName: string;
  organizationPhone: string;
  principalName: string;
  principalPhone: string;
  principalAddress: string;
  lobbyingPurposes: string;
  rawMetadata: RawMetadata;
  principals: ParsedPrincipal[];
}

export type ParseFailureReason = 'empty_page' | 'no_metadata';

/** The page was fetched but held nothing usable. */
export interface ParseFailure {
  reason: ParseFailureReason;
  message: string;
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ParseFailure };

export interface PageContext {
  id: string;
  sourceUrl: string;
}

// ============================================
// Import results
// ============================================

export type SkipReason = 'already_exists' | 'recently_scraped';

export interface ImportSkipped {
  status: 'skipped';
  id: string;
  reason: SkipReason;
}

export interface ReportImportWritten {
  status: 'created' | 'updated';
  id: string;
  contributionsInserted: number;
  expendituresInserted: number;
  contributionsTotal: Decimal;
  expendituresTotal: Decimal;
}

export type ReportImportResult = ImportSkipped | ReportImportWritten;

export interface EntityImportWritten {
  status: 'created' | 'updated';
  id: string;
  childrenInserted: number;
}

export type EntityImportResult = ImportSkipped | EntityImportWritten;

export interface ImportOptions {
  updateExisting: boolean;
  /** Only re-scrape existing rows whose last scrape is older than this many days. */
  refreshAfterDays?: number;
  now?: Date;
}

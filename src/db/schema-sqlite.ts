/**
 * SQLite schema for the Utah disclosure tracker
 * Note: Turso uses SQLite syntax, so the same DDL serves both backends.
 * Money columns hold integer cents.
 */

export const sqliteSchema = `
-- Campaign finance disclosure reports
CREATE TABLE IF NOT EXISTS disclosure_reports (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  report_id TEXT NOT NULL UNIQUE,
  source_url TEXT NOT NULL,
  title TEXT NOT NULL DEFAULT '',
  organization_name TEXT NOT NULL DEFAULT '',
  organization_type TEXT NOT NULL DEFAULT '',
  report_type TEXT NOT NULL DEFAULT '',
  begin_date TEXT,
  end_date TEXT,
  due_date TEXT,
  submit_date TEXT,
  balance_beginning_cents INTEGER NOT NULL DEFAULT 0,
  total_contributions_cents INTEGER NOT NULL DEFAULT 0,
  total_expenditures_cents INTEGER NOT NULL DEFAULT 0,
  balance_ending_cents INTEGER NOT NULL DEFAULT 0,
  report_info TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  last_scraped_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_reports_org_name ON disclosure_reports(organization_name);
CREATE INDEX IF NOT EXISTS idx_reports_org_type ON disclosure_reports(organization_type);
CREATE INDEX IF NOT EXISTS idx_reports_end_date ON disclosure_reports(end_date);

CREATE TABLE IF NOT EXISTS contributions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  report_id INTEGER NOT NULL REFERENCES disclosure_reports(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  date_received TEXT,
  date_received_raw TEXT NOT NULL DEFAULT '',
  contributor_name TEXT NOT NULL,
  address TEXT NOT NULL DEFAULT '',
  is_in_kind INTEGER NOT NULL DEFAULT 0,
  is_loan INTEGER NOT NULL DEFAULT 0,
  is_amendment INTEGER NOT NULL DEFAULT 0,
  amount_cents INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_contributions_report ON contributions(report_id);
CREATE INDEX IF NOT EXISTS idx_contributions_name ON contributions(contributor_name);
CREATE INDEX IF NOT EXISTS idx_contributions_date ON contributions(date_received);

CREATE TABLE IF NOT EXISTS expenditures (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  report_id INTEGER NOT NULL REFERENCES disclosure_reports(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  date TEXT,
  date_raw TEXT NOT NULL DEFAULT '',
  recipient_name TEXT NOT NULL,
  purpose TEXT NOT NULL DEFAULT '',
  is_in_kind INTEGER NOT NULL DEFAULT 0,
  is_loan INTEGER NOT NULL DEFAULT 0,
  is_amendment INTEGER NOT NULL DEFAULT 0,
  amount_cents INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_expenditures_report ON expenditures(report_id);
CREATE INDEX IF NOT EXISTS idx_expenditures_name ON expenditures(recipient_name);
CREATE INDEX IF NOT EXISTS idx_expenditures_date ON expenditures(date);

-- Lobbyist expenditure reports
CREATE TABLE IF NOT EXISTS lobbyist_reports (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  report_id TEXT NOT NULL UNIQUE,
  source_url TEXT NOT NULL,
  title TEXT NOT NULL DEFAULT '',
  principal_name TEXT NOT NULL DEFAULT '',
  principal_phone TEXT NOT NULL DEFAULT '',
  principal_street_address TEXT NOT NULL DEFAULT '',
  principal_city TEXT NOT NULL DEFAULT '',
  principal_state TEXT NOT NULL DEFAULT '',
  principal_zip TEXT NOT NULL DEFAULT '',
  report_type TEXT NOT NULL DEFAULT '',
  begin_date TEXT,
  end_date TEXT,
  due_date TEXT,
  submit_date TEXT,
  total_expenditures_cents INTEGER NOT NULL DEFAULT 0,
  report_info TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  last_scraped_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_lobbyist_reports_principal ON lobbyist_reports(principal_name);

CREATE TABLE IF NOT EXISTS lobbyist_expenditures (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  report_id INTEGER NOT NULL REFERENCES lobbyist_reports(id) ON DELETE CASCADE,
  position INTEGER NOT NULL,
  date TEXT,
  date_raw TEXT NOT NULL DEFAULT '',
  recipient_name TEXT NOT NULL,
  location TEXT NOT NULL DEFAULT '',
  purpose TEXT NOT NULL DEFAULT '',
  is_amendment INTEGER NOT NULL DEFAULT 0,
  amount_cents INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_lobbyist_expenditures_report ON lobbyist_expenditures(report_id);
CREATE INDEX IF NOT EXISTS idx_lobbyist_expenditures_name ON lobbyist_expenditures(recipient_name);

-- Entity registrations (PACs, parties, candidates)
CREATE TABLE IF NOT EXISTS entity_registrations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_id TEXT NOT NULL UNIQUE,
  source_url TEXT NOT NULL,
  name TEXT NOT NULL DEFAULT '',
  also_known_as TEXT NOT NULL DEFAULT '',
  entity_type TEXT NOT NULL DEFAULT '',
  date_created TEXT,
  status TEXT NOT NULL DEFAULT '',
  street_address TEXT NOT NULL DEFAULT '',
  suite_po_box TEXT NOT NULL DEFAULT '',
  city TEXT NOT NULL DEFAULT '',
  state TEXT NOT NULL DEFAULT '',
  zip_code TEXT NOT NULL DEFAULT '',
  raw_data TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  last_scraped_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_entities_name ON entity_registrations(name);

CREATE TABLE IF NOT EXISTS entity_officers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_id INTEGER NOT NULL REFERENCES entity_registrations(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  title TEXT NOT NULL DEFAULT '',
  occupation TEXT NOT NULL DEFAULT '',
  phone TEXT NOT NULL DEFAULT '',
  email TEXT NOT NULL DEFAULT '',
  street_address TEXT NOT NULL DEFAULT '',
  suite_po_box TEXT NOT NULL DEFAULT '',
  city TEXT NOT NULL DEFAULT '',
  state TEXT NOT NULL DEFAULT '',
  zip_code TEXT NOT NULL DEFAULT '',
  position INTEGER NOT NULL DEFAULT 0,
  is_treasurer INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_officers_entity ON entity_officers(entity_id);

-- Lobbyist registrations
CREATE TABLE IF NOT EXISTS lobbyist_registrations (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  entity_id TEXT NOT NULL UNIQUE,
  source_url TEXT NOT NULL,
  first_name TEXT NOT NULL DEFAULT '',
  last_name TEXT NOT NULL DEFAULT '',
  name TEXT NOT NULL DEFAULT '',
  phone TEXT NOT NULL DEFAULT '',
  registration_date TEXT,
  organization_name TEXT NOT NULL DEFAULT '',
  organization_phone TEXT NOT NULL DEFAULT '',
  street_address TEXT NOT NULL DEFAULT '',
  city TEXT NOT NULL DEFAULT '',
  state TEXT NOT NULL DEFAULT '',
  zip_code TEXT NOT NULL DEFAULT '',
  principal_name TEXT NOT NULL DEFAULT '',
  principal_phone TEXT NOT NULL DEFAULT '',
  principal_address TEXT NOT NULL DEFAULT '',
  lobbying_purposes TEXT NOT NULL DEFAULT '',
  raw_data TEXT NOT NULL DEFAULT '{}',
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
  last_scraped_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_lobbyist_registrations_name ON lobbyist_registrations(name);

CREATE TABLE IF NOT EXISTS lobbyist_principals (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  registration_id INTEGER NOT NULL REFERENCES lobbyist_registrations(id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  contact TEXT NOT NULL DEFAULT '',
  phone TEXT NOT NULL DEFAULT '',
  address TEXT NOT NULL DEFAULT '',
  position INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX IF NOT EXISTS idx_principals_registration ON lobbyist_principals(registration_id);
`;

/**
 * Registration importers
 *
 * Entity registrations own their officers; lobbyist registrations own
 * their principals. Both follow the report importers' replace-children
 * transaction.
 */

import type { DbClient, DbExecutor, SqlParam } from '../db/db-adapter.js';
import { flag, metadataToJson } from '../db/rows.js';
import type {
  EntityImportResult,
  EntityImportWritten,
  ImportOptions,
  ParsedEntity,
  ParsedLobbyistEntity,
} from '../types/index.js';
import { insertedId, upsertParent, type ParentTable } from './upsert.js';

export const ENTITIES: ParentTable = { table: 'entity_registrations', keyColumn: 'entity_id' };
export const LOBBYISTS: ParentTable = { table: 'lobbyist_registrations', keyColumn: 'entity_id' };

// ============================================
// Entity registrations
// ============================================

function entityColumns(entity: ParsedEntity): SqlParam[] {
  return [
    entity.sourceUrl,
    entity.name,
    entity.alsoKnownAs,
    entity.entityType,
    entity.dateCreated,
    entity.status,
    entity.streetAddress,
    entity.suitePoBox,
    entity.city,
    entity.state,
    entity.zipCode,
    metadataToJson(entity.rawMetadata),
  ];
}

async function insertOfficers(tx: DbExecutor, entityRowId: number, entity: ParsedEntity): Promise<void> {
  for (const officer of entity.officers) {
    await tx.execute(
      `INSERT INTO entity_officers (
        entity_id, name, title, occupation, phone, email,
        street_address, suite_po_box, city, state, zip_code, position, is_treasurer
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        entityRowId,
        officer.name,
        officer.title,
        officer.occupation,
        officer.phone,
        officer.email,
        officer.streetAddress,
        officer.suitePoBox,
        officer.city,
        officer.state,
        officer.zipCode,
        officer.order,
        flag(officer.isTreasurer),
      ]
    );
  }
}

export async function importEntityRegistration(
  db: DbClient,
  entity: ParsedEntity,
  options: ImportOptions
): Promise<EntityImportResult> {
  return upsertParent<EntityImportWritten>(db, ENTITIES, entity.entityId, options, async (tx, existing, timestamp) => {
    let entityRowId: number;

    if (existing) {
      await tx.execute(
        `UPDATE entity_registrations SET
          source_url = ?, name = ?, also_known_as = ?, entity_type = ?, date_created = ?, status = ?,
          street_address = ?, suite_po_box = ?, city = ?, state = ?, zip_code = ?, raw_data = ?,
          updated_at = ?, last_scraped_at = ?
        WHERE id = ?`,
        [...entityColumns(entity), timestamp, timestamp, existing.id]
      );
      await tx.execute('DELETE FROM entity_officers WHERE entity_id = ?', [existing.id]);
      entityRowId = existing.id;
    } else {
      const inserted = await tx.execute(
        `INSERT INTO entity_registrations (
          source_url, name, also_known_as, entity_type, date_created, status,
          street_address, suite_po_box, city, state, zip_code, raw_data,
          created_at, updated_at, last_scraped_at, entity_id
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [...entityColumns(entity), timestamp, timestamp, timestamp, entity.entityId]
      );
      entityRowId = await insertedId(tx, ENTITIES, entity.entityId, inserted.lastId);
    }

    await insertOfficers(tx, entityRowId, entity);

    return {
      status: existing ? 'updated' : 'created',
      id: entity.entityId,
      childrenInserted: entity.officers.length,
    };
  });
}

// ============================================
// Lobbyist registrations
// ============================================

function lobbyistColumns(lobbyist: ParsedLobbyistEntity): SqlParam[] {
  return [
    lobbyist.sourceUrl,
    lobbyist.firstName,
    lobbyist.lastName,
    lobbyist.name,
    lobbyist.phone,
    lobbyist.registrationDate,
    lobbyist.organizationName,
    lobbyist.organizationPhone,
    lobbyist.streetAddress,
    lobbyist.city,
    lobbyist.state,
    lobbyist.zipCode,
    lobbyist.principalName,
    lobbyist.principalPhone,
    lobbyist.principalAddress,
    lobbyist.lobbyingPurposes,
    metadataToJson(lobbyist.rawMetadata),
  ];
}

async function insertPrincipals(tx: DbExecutor, registrationRowId: number, lobbyist: ParsedLobbyistEntity): Promise<void> {
  for (const principal of lobbyist.principals) {
    await tx.execute(
      `INSERT INTO lobbyist_principals (registration_id, name, contact, phone, address, position)
       VALUES (?, ?, ?, ?, ?, ?)`,
      [registrationRowId, principal.name, principal.contact, principal.phone, principal.address, principal.order]
    );
  }
}

export async function importLobbyistRegistration(
  db: DbClient,
  lobbyist: ParsedLobbyistEntity,
  options: ImportOptions
): Promise<EntityImportResult> {
  return upsertParent<EntityImportWritten>(db, LOBBYISTS, lobbyist.entityId, options, async (tx, existing, timestamp) => {
    let registrationRowId: number;

    if (existing) {
      await tx.execute(
        `UPDATE lobbyist_registrations SET
          source_url = ?, first_name = ?, last_name = ?, name = ?, phone = ?, registration_date = ?,
          organization_name = ?, organization_phone = ?, street_address = ?, city = ?, state = ?,
          zip_code = ?, principal_name = ?, principal_phone = ?, principal_address = ?,
          lobbying_purposes = ?, raw_data = ?, updated_at = ?, last_scraped_at = ?
        WHERE id = ?`,
        [...lobbyistColumns(lobbyist), timestamp, timestamp, existing.id]
      );
      await tx.execute('DELETE FROM lobbyist_principals WHERE registration_id = ?', [existing.id]);
      registrationRowId = existing.id;
    } else {
      const inserted = await tx.execute(
        `INSERT INTO lobbyist_registrations (
          source_url, first_name, last_name, name, phone, registration_date,
          organization_name, organization_phone, street_address, city, state,
          zip_code, principal_name, principal_phone, principal_address,
          lobbying_purposes, raw_data, created_at, updated_at, last_scraped_at, entity_id
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [...lobbyistColumns(lobbyist), timestamp, timestamp, timestamp, lobbyist.entityId]
      );
      registrationRowId = await insertedId(tx, LOBBYISTS, lobbyist.entityId, inserted.lastId);
    }

    await insertPrincipals(tx, registrationRowId, lobbyist);

    return {
      status: existing ? 'updated' : 'created',
      id: lobbyist.entityId,
      childrenInserted: lobbyist.principals.length,
    };
  });
}

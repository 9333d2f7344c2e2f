import { MigrationRepairConfig } from '../types/index.js';

export interface DefectDiagnosis {
  summary: string;
  remediation: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Recognise the fresh-install failure of a migration that drops columns a new
 * database never had. Only diagnoses; the repair stays a manual command.
 */
export function detectMigrationDefect(logs: string, repair: MigrationRepairConfig): DefectDiagnosis | undefined {
  const missingColumn = repair.legacy_columns.find(column =>
    new RegExp(`column "?${escapeRegExp(column)}"?( of relation "?[\\w.]+"?)? does not exist`, 'i').test(logs)
  );
  if (!missingColumn) {
    return undefined;
  }

  const mentionsMigration = logs.includes(repair.migration) || logs.includes(repair.table);
  if (!mentionsMigration) {
    return undefined;
  }

  return {
    summary:
      `Migration ${repair.app_label}.${repair.migration} failed because column "${missingColumn}" does not exist. ` +
      'This happens on a fresh database, which never had the legacy columns the migration drops.',
    remediation: 'Run `nsot-stack fix-migration` to fake-apply that migration and apply the rest'
  };
}

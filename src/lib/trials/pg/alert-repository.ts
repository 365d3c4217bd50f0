import type { AlertRepository } from '../repository';
import type { AlertPatch, AlertSubscription, NewAlertSubscription } from '../types';
import { runQuery } from './executor';
import type { SqlExecutor } from './executor';
import { mapAlert } from './row-mappers';
import type { AlertRaw } from './row-mappers';

const ALERT_COLUMNS = `
  alert_id AS id,
  user_id,
  trial_id,
  disease_area,
  location,
  phase,
  filter_criteria,
  alert_frequency,
  is_active,
  last_notified,
  created_at,
  updated_at
`;

/**
 * SET list for a partial update. Column names are fixed here; only values
 * are bound.
 */
function buildAlertAssignments(patch: AlertPatch, values: unknown[]): string[] {
  const assignments: string[] = [];
  const assign = (column: string, value: unknown, cast = '') => {
    values.push(value);
    assignments.push(`${column} = $${values.length}${cast}`);
  };

  if (patch.trialId !== undefined) assign('trial_id', patch.trialId);
  if (patch.diseaseArea !== undefined) assign('disease_area', patch.diseaseArea);
  if (patch.location !== undefined) assign('location', patch.location);
  if (patch.phase !== undefined) assign('phase', patch.phase);
  if (patch.filterCriteria !== undefined) {
    assign('filter_criteria', JSON.stringify(patch.filterCriteria), '::jsonb');
  }
  if (patch.frequency !== undefined) assign('alert_frequency', patch.frequency);
  if (patch.isActive !== undefined) assign('is_active', patch.isActive);

  return assignments;
}

export class PgAlertRepository implements AlertRepository {
  constructor(private readonly executor: SqlExecutor) {}

  async insert(ownerId: string, alert: NewAlertSubscription): Promise<AlertSubscription> {
    const [row] = await runQuery<AlertRaw>(this.executor, 'alerts.insert', {
      text: `
        INSERT INTO trial_alerts (
          user_id, trial_id, disease_area, location, phase,
          filter_criteria, alert_frequency, is_active, created_at, updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, TRUE, NOW(), NOW())
        RETURNING ${ALERT_COLUMNS}
      `,
      values: [
        ownerId,
        alert.trialId,
        alert.diseaseArea,
        alert.location,
        alert.phase,
        JSON.stringify(alert.filterCriteria),
        alert.frequency,
      ],
    });

    if (!row) {
      throw new Error('Alert insert returned no row');
    }
    return mapAlert(row);
  }

  async listForOwner(ownerId: string): Promise<AlertSubscription[]> {
    const rows = await runQuery<AlertRaw>(this.executor, 'alerts.listForOwner', {
      text: `
        SELECT ${ALERT_COLUMNS}
        FROM trial_alerts
        WHERE user_id = $1
        ORDER BY created_at DESC, alert_id ASC
      `,
      values: [ownerId],
    });
    return rows.map(mapAlert);
  }

  async update(
    ownerId: string,
    alertId: string,
    patch: AlertPatch
  ): Promise<AlertSubscription | null> {
    const values: unknown[] = [];
    const assignments = buildAlertAssignments(patch, values);
    if (assignments.length === 0) {
      throw new Error('Alert update requires at least one field');
    }

    values.push(alertId);
    const alertParam = `$${values.length}`;
    values.push(ownerId);
    const ownerParam = `$${values.length}`;

    // Owner is part of the match, so a foreign alert reads as missing
    const [row] = await runQuery<AlertRaw>(this.executor, 'alerts.update', {
      text: `
        UPDATE trial_alerts
        SET ${assignments.join(', ')}, updated_at = NOW()
        WHERE alert_id = ${alertParam} AND user_id = ${ownerParam}
        RETURNING ${ALERT_COLUMNS}
      `,
      values,
    });
    return row ? mapAlert(row) : null;
  }

  async remove(ownerId: string, alertId: string): Promise<boolean> {
    const rows = await runQuery<{ removed: number }>(this.executor, 'alerts.remove', {
      text: `
        DELETE FROM trial_alerts
        WHERE alert_id = $1 AND user_id = $2
        RETURNING 1 AS removed
      `,
      values: [alertId, ownerId],
    });
    return rows.length > 0;
  }

  async listActive(): Promise<AlertSubscription[]> {
    const rows = await runQuery<AlertRaw>(this.executor, 'alerts.listActive', {
      text: `
        SELECT ${ALERT_COLUMNS}
        FROM trial_alerts
        WHERE is_active = TRUE
        ORDER BY created_at ASC, alert_id ASC
      `,
      values: [],
    });
    return rows.map(mapAlert);
  }
}

import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import type { PaginatedResponse, ServiceItem } from '../../shared/types';
import { NotFoundError, ValidationError } from '../lib/errors';
import { toNumber } from '../lib/money';
import { toTimestamp } from '../lib/dates';
import { Row, bool, str, strOrNull } from '../lib/rows';

export interface CreateServiceItemInput {
  name: string;
  unit_price?: number;
  /** What delivering one unit of the service costs the business. */
  service_charge?: number;
  branch_id?: string | null;
}

export function mapServiceItemRow(row: Row): ServiceItem {
  return {
    id: str(row.id),
    name: str(row.name),
    unit_price: toNumber(row.unit_price),
    service_charge: toNumber(row.service_charge),
    is_active: bool(row.is_active),
    branch_id: strOrNull(row.branch_id),
    created_at: toTimestamp(row.created_at) ?? '',
  };
}

class ServiceCatalogService extends BaseService {
  constructor() {
    super('service_items');
  }

  async createServiceItem(input: CreateServiceItemInput, trx?: Knex.Transaction): Promise<ServiceItem> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Service name is required', 'name');
    const unitPrice = input.unit_price ?? 0;
    const charge = input.service_charge ?? 0;
    if (unitPrice < 0) throw new ValidationError('unit_price must be zero or more', 'unit_price');
    if (charge < 0) throw new ValidationError('service_charge must be zero or more', 'service_charge');

    const id = randomUUID();
    await this.conn(trx)(this.tableName).insert({
      id,
      name,
      unit_price: unitPrice,
      service_charge: charge,
      is_active: true,
      branch_id: input.branch_id || null,
      created_at: new Date().toISOString(),
    });
    return this.getServiceItem(id, trx);
  }

  async getServiceItem(id: string, trx?: Knex.Transaction): Promise<ServiceItem> {
    const row = await this.findRow(id, trx);
    if (!row) throw new NotFoundError('Service', id);
    return mapServiceItemRow(row);
  }

  async findServiceItem(id: string, trx?: Knex.Transaction): Promise<ServiceItem | null> {
    const row = await this.findRow(id, trx);
    return row ? mapServiceItemRow(row) : null;
  }

  async listServiceItems(options: ListOptions & { branch_id?: string }): Promise<PaginatedResponse<ServiceItem>> {
    return this.paginate(
      { ...options, filters: { branch_id: options.branch_id } },
      mapServiceItemRow,
    );
  }
}

export const serviceCatalogService = new ServiceCatalogService();

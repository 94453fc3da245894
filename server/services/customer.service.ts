import { randomUUID } from 'crypto';
import { Knex } from 'knex';
import { BaseService, ListOptions } from './base.service';
import type { Customer, PaginatedResponse } from '../../shared/types';
import { NotFoundError, ValidationError } from '../lib/errors';
import { toTimestamp } from '../lib/dates';
import { Row, str, strOrNull } from '../lib/rows';

export interface CreateCustomerInput {
  name: string;
  email?: string | null;
  phone?: string | null;
  branch_id?: string | null;
}

export function mapCustomerRow(row: Row): Customer {
  return {
    id: str(row.id),
    name: str(row.name),
    email: strOrNull(row.email),
    phone: strOrNull(row.phone),
    branch_id: strOrNull(row.branch_id),
    created_at: toTimestamp(row.created_at) ?? '',
  };
}

class CustomerService extends BaseService {
  constructor() {
    super('customers');
  }

  async createCustomer(input: CreateCustomerInput, trx?: Knex.Transaction): Promise<Customer> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Customer name is required', 'name');

    const id = randomUUID();
    await this.conn(trx)(this.tableName).insert({
      id,
      name,
      email: input.email || null,
      phone: input.phone || null,
      branch_id: input.branch_id || null,
      created_at: new Date().toISOString(),
    });
    return this.getCustomer(id, trx);
  }

  async getCustomer(id: string, trx?: Knex.Transaction): Promise<Customer> {
    const row = await this.findRow(id, trx);
    if (!row) throw new NotFoundError('Customer', id);
    return mapCustomerRow(row);
  }

  async listCustomers(options: ListOptions & { branch_id?: string }): Promise<PaginatedResponse<Customer>> {
    return this.paginate(
      {
        ...options,
        searchFields: ['name', 'email', 'phone'],
        filters: { branch_id: options.branch_id },
      },
      mapCustomerRow,
    );
  }
}

export const customerService = new CustomerService();

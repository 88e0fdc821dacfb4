import {
  IntegrationConfig,
  odooMajorVersion,
} from '../../integrations/integration.types';
import { OdooDomain, OdooRecord } from '../../odoo/interfaces/odoo.interface';
import { Customer, CustomerInput } from '../../rental/rental.types';
import { readOptionalString, readString } from '../odoo-fields';

export const PARTNER = 'res.partner';

type CustomerFlag = { customer: true } | { customer_rank: number };

export type PartnerValues = {
  name: string;
  email: string;
  phone: string;
  street: string;
  company_id: number;
  x_backoffice_id: string;
} & CustomerFlag;

export const PARTNER_FIELDS = [
  'id',
  'name',
  'email',
  'phone',
  'street',
  'x_backoffice_id',
  'write_date',
];

export interface RemotePartner {
  id: number;
  name: string;
  email: string | null;
  phone: string;
  street: string;
  backofficeId: string | null;
}

/** Odoo 13 replaced the boolean `customer` flag with `customer_rank`. */
function usesCustomerRank(integration: IntegrationConfig): boolean {
  return odooMajorVersion(integration.connection.version) >= 13;
}

export function customerDomain(integration: IntegrationConfig): OdooDomain {
  return usesCustomerRank(integration)
    ? [['customer_rank', '>', 0]]
    : [['customer', '=', true]];
}

export function fullName(customer: Pick<Customer, 'firstName' | 'lastName'>): string {
  return `${customer.firstName} ${customer.lastName}`.trim();
}

export function toPartner(
  customer: Customer,
  integration: IntegrationConfig,
): PartnerValues {
  const flag: CustomerFlag = usesCustomerRank(integration)
    ? { customer_rank: 1 }
    : { customer: true };

  return {
    name: fullName(customer),
    email: customer.email,
    phone: customer.phone,
    street: customer.address,
    company_id: integration.connection.companyId,
    x_backoffice_id: customer.id,
    ...flag,
  };
}

export function readPartner(record: OdooRecord): RemotePartner {
  return {
    id: record.id,
    name: readString(record, 'name'),
    email: readOptionalString(record, 'email'),
    phone: readString(record, 'phone'),
    street: readString(record, 'street'),
    backofficeId: readOptionalString(record, 'x_backoffice_id'),
  };
}

/** "Ada King Lovelace" -> first "Ada", last "King Lovelace". */
export function splitName(name: string): { firstName: string; lastName: string } {
  const trimmed = name.trim();
  const space = trimmed.indexOf(' ');
  if (space === -1) {
    return { firstName: trimmed, lastName: '' };
  }
  return {
    firstName: trimmed.slice(0, space),
    lastName: trimmed.slice(space + 1).trim(),
  };
}

/** Fields an import overwrites; the e-mail only when Odoo has one. */
export function customerUpdateFrom(remote: RemotePartner): Partial<CustomerInput> {
  const update: Partial<CustomerInput> = {
    ...splitName(remote.name),
    phone: remote.phone,
    address: remote.street,
  };
  if (remote.email !== null) {
    update.email = remote.email;
  }
  return update;
}

/** Username candidate: the e-mail's local part, else the name in snake case. */
export function baseUsername(remote: RemotePartner): string {
  const fromEmail = remote.email?.split('@')[0] ?? '';
  if (fromEmail !== '') {
    return fromEmail.toLowerCase();
  }
  const fromName = remote.name.trim().toLowerCase().replace(/\s+/g, '_');
  return fromName === '' ? `partner_${remote.id}` : fromName;
}

export function newCustomerFrom(remote: RemotePartner, username: string): CustomerInput {
  return {
    username,
    ...splitName(remote.name),
    email: remote.email ?? '',
    phone: remote.phone,
    address: remote.street,
    role: 'customer',
    status: 'active',
  };
}

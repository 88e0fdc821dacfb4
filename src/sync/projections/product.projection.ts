import type { IntegrationConfig } from '../../integrations/integration.types';
import { OdooRecord } from '../../odoo/interfaces/odoo.interface';
import { Product, ProductInput } from '../../rental/rental.types';
import {
  readNumber,
  readOptionalString,
  readString,
} from '../odoo-fields';

export const PRODUCT_TEMPLATE = 'product.template';
export const PRODUCT_VARIANT = 'product.product';

export const IMPORTED_PRODUCT_CATEGORY = 'Imported from Odoo';

export type ProductTemplateValues = {
  name: string;
  default_code: string;
  list_price: number;
  standard_price: number;
  type: 'product';
  description: string;
  company_id: number;
  x_backoffice_id: string;
  x_backoffice_code: string;
};

export const PRODUCT_TEMPLATE_FIELDS = [
  'id',
  'name',
  'default_code',
  'list_price',
  'standard_price',
  'description',
  'x_backoffice_id',
  'write_date',
];

export interface RemoteProduct {
  id: number;
  name: string;
  defaultCode: string | null;
  listPrice: number;
  standardPrice: number;
  description: string;
  backofficeId: string | null;
}

export function toProductTemplate(
  product: Product,
  integration: IntegrationConfig,
): ProductTemplateValues {
  return {
    name: product.name,
    default_code: product.sku,
    list_price: product.rentalPrice,
    standard_price: product.replacementValue,
    type: 'product',
    description: product.description,
    company_id: integration.connection.companyId,
    x_backoffice_id: product.id,
    x_backoffice_code: product.code,
  };
}

export function readProductTemplate(record: OdooRecord): RemoteProduct {
  return {
    id: record.id,
    name: readString(record, 'name'),
    defaultCode: readOptionalString(record, 'default_code'),
    listPrice: readNumber(record, 'list_price'),
    standardPrice: readNumber(record, 'standard_price'),
    description: readString(record, 'description'),
    backofficeId: readOptionalString(record, 'x_backoffice_id'),
  };
}

/** Fields an import overwrites on an existing product. */
export function productUpdateFrom(
  remote: RemoteProduct,
): Partial<ProductInput> {
  return {
    name: remote.name,
    sku: remote.defaultCode ?? `ODO-${remote.id}`,
    rentalPrice: remote.listPrice,
    replacementValue: remote.standardPrice,
    description: remote.description,
  };
}

export function newProductFrom(remote: RemoteProduct, code: string): ProductInput {
  return {
    code,
    name: remote.name,
    sku: remote.defaultCode ?? `ODO-${remote.id}`,
    category: IMPORTED_PRODUCT_CATEGORY,
    description: remote.description,
    rentalPrice: remote.listPrice,
    replacementValue: remote.standardPrice,
    stock: 0,
    availableForRent: 0,
    status: 'active',
  };
}

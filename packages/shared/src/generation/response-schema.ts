/**
 * JSON Schema for Structured Outputs
 *
 * Sent with every generation request. All keys are required and nullable,
 * so an unknown value is an explicit null rather than a missing key.
 */

export interface ResponseSchema {
  name: string;
  strict: boolean;
  schema: Record<string, unknown>;
}

export const FINANCIAL_METRICS_SCHEMA: ResponseSchema = {
  name: 'financial_metrics',
  strict: true,
  schema: {
    type: 'object',
    additionalProperties: false,
    required: [
      'company_ticker',
      'fiscal_year',
      'cik',
      'total_revenue',
      'net_income',
      'north_america_revenue',
      'depreciation_amortization',
      'lease_liabilities',
    ],
    properties: {
      company_ticker: { type: 'string', description: 'Company ticker symbol' },
      fiscal_year: { type: ['integer', 'null'], description: 'Fiscal year of the report' },
      cik: {
        type: ['string', 'null'],
        description: 'Central Index Key, digits only',
      },
      total_revenue: {
        type: ['number', 'null'],
        description: 'Total revenue for the most recent fiscal year (in millions USD)',
      },
      net_income: {
        type: ['number', 'null'],
        description: 'Net income for the most recent fiscal year (in millions USD)',
      },
      north_america_revenue: {
        type: ['number', 'null'],
        description: 'Revenue attributed to North America region (in millions USD)',
      },
      depreciation_amortization: {
        type: ['number', 'null'],
        description: 'Total depreciation and amortization from Cash Flow Statement (in millions USD)',
      },
      lease_liabilities: {
        type: ['number', 'null'],
        description: 'Sum of current and non-current lease liabilities from Balance Sheet (in millions USD)',
      },
    },
  },
};

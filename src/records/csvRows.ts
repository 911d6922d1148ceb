/**
 * Column names accepted for each record field, first non-empty wins.
 * The CRM export headers are listed alongside the plain ones.
 */
const COLUMNS = {
  id: ['Id', 'id', 'AccountId'],
  name: ['Name', 'name', 'company_name'],
  website: ['Website', 'website', 'url', 'domain'],
  email: ['ContactMostFrequentEmail', 'ContactMostFrequentEmail__c', 'email'],
  billingState: ['BillingState', 'billing_state'],
  billingCountry: ['BillingCountry', 'billing_country'],
  billingPostalCode: ['BillingPostalCode', 'billing_postal_code'],
  enrichmentName: ['EnrichmentCompanyName', 'ZI_Company_Name__c', 'enrichment_company_name'],
  enrichmentWebsite: ['EnrichmentWebsite', 'ZI_Website__c', 'enrichment_website'],
  enrichmentState: ['EnrichmentState', 'ZI_Company_State__c', 'enrichment_state'],
  enrichmentCountry: ['EnrichmentCountry', 'ZI_Company_Country__c', 'enrichment_country'],
  enrichmentPostalCode: ['EnrichmentPostalCode', 'ZI_Company_Postal_Code__c', 'enrichment_postal_code'],
  parentId: ['ParentId', 'parent_id'],
  parentName: ['ParentName', 'Parent.Name', 'parent_name'],
} as const;

function pick(row: Record<string, string>, keys: readonly string[]) {
  for (const k of keys) {
    const v = row[k];
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

/** Reshape a flat CSV row into the nested record wire shape (validated later). */
export function recordFromCsvRow(row: Record<string, string>) {
  return {
    id: pick(row, COLUMNS.id),
    name: pick(row, COLUMNS.name),
    website: pick(row, COLUMNS.website),
    email: pick(row, COLUMNS.email),
    billing: {
      state: pick(row, COLUMNS.billingState),
      country: pick(row, COLUMNS.billingCountry),
      postalCode: pick(row, COLUMNS.billingPostalCode),
    },
    enrichment: {
      companyName: pick(row, COLUMNS.enrichmentName),
      website: pick(row, COLUMNS.enrichmentWebsite),
      address: {
        state: pick(row, COLUMNS.enrichmentState),
        country: pick(row, COLUMNS.enrichmentCountry),
        postalCode: pick(row, COLUMNS.enrichmentPostalCode),
      },
    },
    parentId: pick(row, COLUMNS.parentId),
    parentName: pick(row, COLUMNS.parentName),
  };
}

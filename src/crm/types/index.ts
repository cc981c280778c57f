// ============================================================================
// CRM Types — sObject schemas, API response shapes, key prefixes
// ============================================================================

import { z } from 'zod';

// ============================================================================
// sObject Schemas
// ============================================================================
//
// Every field except Id is optional: a record built locally may carry only
// its natural key until defaults are applied. Nullable because the query
// endpoint returns null for blank fields. Unknown keys (attributes, etc.)
// are stripped on parse.

const optionalText = z.string().nullable().optional();

export const AccountSchema = z.object({
  Id: z.string().optional(),
  Name: optionalText,
  Industry: optionalText,
  Description: optionalText,
});

export const ContactSchema = z.object({
  Id: z.string().optional(),
  AccountId: optionalText,
  FirstName: optionalText,
  LastName: optionalText,
  Title: optionalText,
});

export const OpportunitySchema = z.object({
  Id: z.string().optional(),
  AccountId: optionalText,
  Name: optionalText,
  StageName: optionalText,
  /** YYYY-MM-DD */
  CloseDate: optionalText,
  Amount: z.number().nullable().optional(),
});

export const LeadSchema = z.object({
  Id: z.string().optional(),
  LastName: optionalText,
  Company: optionalText,
  Status: optionalText,
});

export const CaseSchema = z.object({
  Id: z.string().optional(),
  Subject: optionalText,
  Status: optionalText,
  Origin: optionalText,
});

export type Account = z.infer<typeof AccountSchema>;
export type Contact = z.infer<typeof ContactSchema>;
export type Opportunity = z.infer<typeof OpportunitySchema>;
export type Lead = z.infer<typeof LeadSchema>;
export type CaseRecord = z.infer<typeof CaseSchema>;

export interface SObjectMap {
  Account: Account;
  Contact: Contact;
  Opportunity: Opportunity;
  Lead: Lead;
  Case: CaseRecord;
}

export type SObjectName = keyof SObjectMap;

/** Field names of an sObject, e.g. FieldName<'Account'> = 'Id' | 'Name' | ... */
export type FieldName<N extends SObjectName> = Extract<keyof SObjectMap[N], string>;

export type FieldValue = string | number | boolean | null;

export const SOBJECT_SCHEMAS: { [N in SObjectName]: z.ZodType<SObjectMap[N]> } = {
  Account: AccountSchema,
  Contact: ContactSchema,
  Opportunity: OpportunitySchema,
  Lead: LeadSchema,
  Case: CaseSchema,
};

/** Three-character id prefixes the platform assigns per object type */
export const KEY_PREFIXES: Readonly<Record<SObjectName, string>> = {
  Account: '001',
  Contact: '003',
  Opportunity: '006',
  Lead: '00Q',
  Case: '500',
};

/** Fields the platform rejects a create without */
export const REQUIRED_FIELDS: { readonly [N in SObjectName]: readonly FieldName<N>[] } = {
  Account: ['Name'],
  Contact: ['LastName'],
  Opportunity: ['Name', 'StageName', 'CloseDate'],
  Lead: ['LastName', 'Company'],
  Case: [],
};

// ============================================================================
// REST API Response Shapes
// ============================================================================

export const PlatformErrorSchema = z.object({
  statusCode: z.string(),
  message: z.string(),
  fields: z.array(z.string()).default([]),
});

export type PlatformError = z.infer<typeof PlatformErrorSchema>;

/** One entry of an sObject Collections response (insert/update/upsert/delete) */
export const SaveResultSchema = z.object({
  id: z.string().nullable().optional(),
  success: z.boolean(),
  errors: z.array(PlatformErrorSchema).default([]),
  created: z.boolean().optional(),
});

export type SaveResult = z.infer<typeof SaveResultSchema>;

export const SaveResultListSchema = z.array(SaveResultSchema);

export const QueryResponseSchema = z.object({
  totalSize: z.number(),
  done: z.boolean(),
  nextRecordsUrl: z.string().optional(),
  records: z.array(z.unknown()),
});

export type QueryResponse = z.infer<typeof QueryResponseSchema>;

/** Error body of a non-2xx REST response */
export const ApiErrorBodySchema = z.array(
  z.object({
    errorCode: z.string(),
    message: z.string(),
    fields: z.array(z.string()).optional(),
  }),
);

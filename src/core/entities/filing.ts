export const formTypes = ["10-K", "10-Q", "8-K", "DEF 14A", "4", "SC 13D"] as const;

export type FormType = (typeof formTypes)[number];

/**
 * Role each form plays when a snapshot is assembled.
 */
export const formRoles = {
  "10-K": "anchor_report",
  "10-Q": "periodic_report",
  "8-K": "event_report",
  "DEF 14A": "proxy_statement",
  "4": "ownership_report",
  "SC 13D": "activist_stake_report",
} as const satisfies Record<FormType, string>;

export type FormRole = (typeof formRoles)[FormType];

/**
 * Catalog folder per form; filings live under `<TICKER>/<folder>/<YYYY-MM-DD>_<accession>/`.
 */
export const formFolders: Record<FormType, string> = {
  "10-K": "10-K",
  "10-Q": "10-Q",
  "8-K": "8-K",
  "DEF 14A": "Proxy_Statement",
  "4": "Insider_Trading",
  "SC 13D": "Activist_Stake",
};

export const isFormType = (value: string): value is FormType =>
  (formTypes as readonly string[]).includes(value);

export type SavedFile = Readonly<{
  name: string;
  purpose: string;
  documentType: string;
}>;

/**
 * One materialized regulatory document. Dates are UTC midnight calendar dates.
 */
export type FilingDocument = Readonly<{
  ticker: string;
  formType: FormType;
  filingDate: Date;
  periodOfReport?: Date;
  fiscalYear?: number;
  accessionId: string;
  savedFiles: readonly SavedFile[];
  sourcePath: string;
}>;

import { PropertyRecord } from "../types/hoa";
import { formatAmount } from "../utils/money";
import { formatContactName, formatDisplayLabel } from "../utils/propertyLabel";

export type PropertyContext = {
  address?: string | null;
  unit_number?: string | null;
  hoa_fees_monthly?: number | null;
  resident_name?: string | null;
};

export type MaintenanceContext = {
  request_title?: string | null;
  status?: string | null;
  notes?: string | null;
};

export type FinancialContext = {
  current_balance?: number | string | null;
  due_date?: string | null;
};

export type TemplateContext = {
  property?: PropertyContext | null;
  maintenance?: MaintenanceContext | null;
  financial?: FinancialContext | null;
};

export const TEMPLATE_VARIABLES = [
  "property_address",
  "resident_name",
  "monthly_fee",
  "current_balance",
  "due_date",
  "request_title",
  "status",
  "notes",
] as const;

export type TemplateVariable = (typeof TEMPLATE_VARIABLES)[number];

type TemplateRule = {
  variable: TemplateVariable;
  // undefined means the context did not supply a value
  resolve: (context: TemplateContext) => string | undefined;
  fallback?: string;
};

const PLACEHOLDER_PATTERN = /\{\{(\w+)\}\}/g;

function present(value: string | null | undefined): string | undefined {
  return value === null || value === undefined ? undefined : value;
}

function amount(value: number | string | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  return typeof value === "number" ? formatAmount(value) : value;
}

// Order matters only for listTemplateVariables(); each placeholder is
// resolved independently.
const TEMPLATE_RULES: readonly TemplateRule[] = [
  {
    variable: "property_address",
    resolve: ({ property }) =>
      property
        ? formatDisplayLabel(property.address ?? "", property.unit_number)
        : undefined,
  },
  {
    variable: "resident_name",
    resolve: ({ property }) =>
      property ? (property.resident_name ?? "") : undefined,
  },
  {
    variable: "monthly_fee",
    resolve: ({ property }) =>
      property ? (amount(property.hoa_fees_monthly) ?? "") : undefined,
  },
  {
    variable: "current_balance",
    resolve: ({ financial }) => amount(financial?.current_balance),
    fallback: "0.00",
  },
  {
    variable: "due_date",
    resolve: ({ financial }) => present(financial?.due_date),
    fallback: "End of Month",
  },
  {
    variable: "request_title",
    resolve: ({ maintenance }) => present(maintenance?.request_title),
    fallback: "",
  },
  {
    variable: "status",
    resolve: ({ maintenance }) => present(maintenance?.status),
    fallback: "",
  },
  {
    variable: "notes",
    resolve: ({ maintenance }) => present(maintenance?.notes),
    fallback: "",
  },
];

const RULES_BY_VARIABLE = new Map<string, TemplateRule>(
  TEMPLATE_RULES.map((rule) => [rule.variable, rule]),
);

/**
 * Replace every known `{{variable}}` in one pass. A context value wins, even
 * an empty string; otherwise the rule's fallback applies. Once a property is
 * in the context its placeholders always resolve, blank where the field is
 * empty. Without a property they are left as written, as are unknown
 * placeholders. Substituted values are not re-scanned.
 */
export function renderTemplate(
  template: string,
  context: TemplateContext = {},
): string {
  return template.replace(PLACEHOLDER_PATTERN, (match, name: string) => {
    const rule = RULES_BY_VARIABLE.get(name);
    if (!rule) {
      return match;
    }
    return rule.resolve(context) ?? rule.fallback ?? match;
  });
}

export function listTemplateVariables(): TemplateVariable[] {
  return TEMPLATE_RULES.map((rule) => rule.variable);
}

export function findPlaceholders(template: string): {
  known: TemplateVariable[];
  unknown: string[];
} {
  const known: TemplateVariable[] = [];
  const unknown: string[] = [];

  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    const rule = RULES_BY_VARIABLE.get(name);
    if (rule) {
      if (!known.includes(rule.variable)) known.push(rule.variable);
    } else if (!unknown.includes(name)) {
      unknown.push(name);
    }
  }

  return { known, unknown };
}

export function propertyContextFromRecord(
  record: PropertyRecord,
): PropertyContext {
  const contact = record.primary_contact;
  return {
    address: record.address,
    unit_number: record.unit_number,
    hoa_fees_monthly: record.hoa_fees_monthly,
    resident_name: contact
      ? formatContactName(contact.first_name, contact.last_name)
      : null,
  };
}

import { sql } from "drizzle-orm";

import { HoaDatabase } from "./index";
import {
  emailTemplates,
  financialTransactions,
  maintenanceRequests,
  properties,
  residents,
} from "./schema";

type SampleProperty = {
  address: string;
  unitNumber: string | null;
  propertyType: string;
  hoaFeesMonthly: number;
  contact: { firstName: string; lastName: string; email: string | null };
};

const SAMPLE_PROPERTIES: SampleProperty[] = [
  {
    address: "12 Willow Creek Dr",
    unitNumber: null,
    propertyType: "Single Family",
    hoaFeesMonthly: 185,
    contact: { firstName: "Dana", lastName: "Whitfield", email: "dana@example.test" },
  },
  {
    address: "40 Lakeview Ct",
    unitNumber: "2B",
    propertyType: "Condo",
    hoaFeesMonthly: 240,
    contact: { firstName: "Luis", lastName: "Ortega", email: "luis@example.test" },
  },
  {
    address: "40 Lakeview Ct",
    unitNumber: "3A",
    propertyType: "Condo",
    hoaFeesMonthly: 240,
    // no address on file: batch sends report this one as failed
    contact: { firstName: "Priya", lastName: "Nair", email: null },
  },
  {
    address: "7 Aspen Row",
    unitNumber: null,
    propertyType: "Townhome",
    hoaFeesMonthly: 210,
    contact: { firstName: "Sam", lastName: "Keller", email: "sam@example.test" },
  },
];

const MONTHLY_STATEMENT_BODY = `Dear {{resident_name}},

Please find your monthly HOA statement for {{property_address}}.

Current Balance: \${{current_balance}}
Monthly HOA Fee: \${{monthly_fee}}
Due Date: {{due_date}}

Best regards,
HOA Management Team`;

const MAINTENANCE_NOTICE_BODY = `Hello {{resident_name}},

Your maintenance request "{{request_title}}" for {{property_address}} is now {{status}}.

{{notes}}

HOA Management Team`;

/**
 * Seeds the database with sample records for development.
 * Only inserts if the properties table is empty; returns the number of
 * properties inserted.
 */
export function seedDatabase(db: HoaDatabase): number {
  const existing = db
    .select({ count: sql<number>`count(*)`.mapWith(Number) })
    .from(properties)
    .get();
  if ((existing?.count ?? 0) > 0) return 0;

  const now = new Date().toISOString();
  const propertyIds: number[] = [];

  for (const sample of SAMPLE_PROPERTIES) {
    const row = db
      .insert(properties)
      .values({
        address: sample.address,
        unitNumber: sample.unitNumber,
        propertyType: sample.propertyType,
        hoaFeesMonthly: sample.hoaFeesMonthly,
        createdDate: now,
        updatedDate: now,
      })
      .returning({ id: properties.id })
      .get();
    propertyIds.push(row.id);

    db.insert(residents)
      .values({
        propertyId: row.id,
        firstName: sample.contact.firstName,
        lastName: sample.contact.lastName,
        email: sample.contact.email,
        isOwner: true,
        isPrimaryContact: true,
        createdDate: now,
      })
      .run();
  }

  const [willow, lakeview2b, , aspen] = propertyIds;

  db.insert(maintenanceRequests)
    .values([
      {
        propertyId: willow,
        requestType: "Irrigation",
        priority: "High",
        title: "Sprinkler head broken near sidewalk",
        reportedBy: "Dana Whitfield",
        estimatedCost: 75,
        status: "Open",
        createdDate: now,
      },
      {
        propertyId: aspen,
        requestType: "Landscaping",
        priority: "Low",
        title: "Trim hedges along east fence",
        estimatedCost: 220,
        status: "In Progress",
        assignedTo: "Greenway Landscaping",
        createdDate: now,
      },
    ])
    .run();

  db.insert(financialTransactions)
    .values([
      {
        propertyId: willow,
        transactionType: "Assessment",
        category: "Monthly Dues",
        amount: 185,
        dueDate: "2026-11-01",
        createdDate: now,
      },
      {
        propertyId: lakeview2b,
        transactionType: "Assessment",
        category: "Monthly Dues",
        amount: 240,
        dueDate: "2026-11-01",
        createdDate: now,
      },
      {
        propertyId: lakeview2b,
        transactionType: "Payment",
        category: "Monthly Dues",
        amount: -240,
        paidDate: "2026-10-15",
        paymentMethod: "ACH",
        createdDate: now,
      },
    ])
    .run();

  db.insert(emailTemplates)
    .values([
      {
        templateName: "Monthly Statement",
        subjectLine: "Monthly HOA Statement - {{property_address}}",
        bodyTemplate: MONTHLY_STATEMENT_BODY,
        templateType: "Monthly Statement",
        isActive: true,
        createdDate: now,
      },
      {
        templateName: "Maintenance Update",
        subjectLine: "Maintenance update: {{request_title}}",
        bodyTemplate: MAINTENANCE_NOTICE_BODY,
        templateType: "Maintenance Notice",
        isActive: true,
        createdDate: now,
      },
    ])
    .run();

  return propertyIds.length;
}

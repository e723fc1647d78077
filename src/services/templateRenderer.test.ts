import { describe, expect, it } from "vitest";

import { PropertyRecord } from "../types/hoa";
import {
  findPlaceholders,
  listTemplateVariables,
  propertyContextFromRecord,
  renderTemplate,
} from "./templateRenderer";

describe("renderTemplate", () => {
  it("substitutes the resident name and defaults the balance", () => {
    const rendered = renderTemplate(
      "Hi {{resident_name}}, balance {{current_balance}}",
      { property: { resident_name: "Jane Doe" } },
    );
    expect(rendered).toBe("Hi Jane Doe, balance 0.00");
  });

  it("fills the default-bearing placeholders with no context", () => {
    expect(
      renderTemplate(
        "[{{current_balance}}] [{{due_date}}] [{{request_title}}] [{{status}}] [{{notes}}]",
      ),
    ).toBe("[0.00] [End of Month] [] [] []");
  });

  it("leaves property placeholders as written when no property is given", () => {
    expect(
      renderTemplate("{{property_address}} / {{resident_name}} / {{monthly_fee}}"),
    ).toBe("{{property_address}} / {{resident_name}} / {{monthly_fee}}");
  });

  it("blanks property placeholders whose field is empty", () => {
    expect(
      renderTemplate("[{{property_address}}] [{{resident_name}}] [${{monthly_fee}}]", {
        property: {
          address: "5 Pine St",
          unit_number: null,
          hoa_fees_monthly: null,
          resident_name: null,
        },
      }),
    ).toBe("[5 Pine St] [] [$]");
  });

  it("keeps unknown placeholders as written", () => {
    expect(renderTemplate("Dear {{owner_nickname}}, {{due_date}}")).toBe(
      "Dear {{owner_nickname}}, End of Month",
    );
  });

  it("does not touch text without placeholders", () => {
    const text = "Pool closes at 9pm. {not a placeholder} {{ spaced }}";
    expect(renderTemplate(text, { property: { address: "1 Main St" } })).toBe(
      text,
    );
  });

  it("renders the full context", () => {
    const rendered = renderTemplate(
      "{{property_address}}: {{resident_name}} owes ${{current_balance}} of ${{monthly_fee}} by {{due_date}}. {{request_title}} is {{status}} ({{notes}})",
      {
        property: {
          address: "40 Lakeview Ct",
          unit_number: "2B",
          hoa_fees_monthly: 240,
          resident_name: "Luis Ortega",
        },
        financial: { current_balance: 52.5, due_date: "2026-11-01" },
        maintenance: {
          request_title: "Gate sensor",
          status: "In Progress",
          notes: "Parts ordered",
        },
      },
    );
    expect(rendered).toBe(
      "40 Lakeview Ct 2B: Luis Ortega owes $52.50 of $240.00 by 2026-11-01. Gate sensor is In Progress (Parts ordered)",
    );
  });

  it("keeps an explicit empty value instead of the default", () => {
    expect(
      renderTemplate("[{{due_date}}]", { financial: { due_date: "" } }),
    ).toBe("[]");
  });

  it("passes a preformatted balance string through", () => {
    expect(
      renderTemplate("{{current_balance}}", {
        financial: { current_balance: "1,204.10" },
      }),
    ).toBe("1,204.10");
  });

  it("does not re-scan substituted values", () => {
    expect(
      renderTemplate("{{notes}}", {
        maintenance: { notes: "see {{due_date}}" },
      }),
    ).toBe("see {{due_date}}");
  });
});

describe("findPlaceholders", () => {
  it("splits known and unknown names in first-seen order", () => {
    expect(
      findPlaceholders(
        "{{resident_name}} {{foo}} {{due_date}} {{resident_name}} {{foo}} {{bar}}",
      ),
    ).toEqual({
      known: ["resident_name", "due_date"],
      unknown: ["foo", "bar"],
    });
  });
});

describe("listTemplateVariables", () => {
  it("lists every supported placeholder", () => {
    expect(listTemplateVariables()).toEqual([
      "property_address",
      "resident_name",
      "monthly_fee",
      "current_balance",
      "due_date",
      "request_title",
      "status",
      "notes",
    ]);
  });
});

describe("propertyContextFromRecord", () => {
  const base: PropertyRecord = {
    id: 3,
    address: "7 Aspen Row",
    unit_number: null,
    display_label: "7 Aspen Row",
    property_type: "Townhome",
    square_footage: null,
    lot_size_sqft: null,
    hoa_fees_monthly: 210,
    created_date: "2026-01-01T00:00:00.000Z",
    updated_date: "2026-01-01T00:00:00.000Z",
    primary_contact: null,
  };

  it("uses the primary contact's name", () => {
    const context = propertyContextFromRecord({
      ...base,
      primary_contact: {
        resident_id: 9,
        first_name: "Sam",
        last_name: "Keller",
        email: "sam@example.test",
        phone: null,
        is_owner: true,
        move_in_date: null,
      },
    });
    expect(context).toEqual({
      address: "7 Aspen Row",
      unit_number: null,
      hoa_fees_monthly: 210,
      resident_name: "Sam Keller",
    });
  });

  it("renders a blank name without a contact", () => {
    const context = propertyContextFromRecord(base);
    expect(context.resident_name).toBeNull();
    expect(renderTemplate("Dear {{resident_name}},", { property: context })).toBe(
      "Dear ,",
    );
  });
});

export function formatDisplayLabel(
  address: string,
  unitNumber: string | null | undefined,
): string {
  return `${address} ${unitNumber ?? ""}`.trim();
}

export function formatContactName(
  firstName: string | null | undefined,
  lastName: string | null | undefined,
): string | null {
  const name = [firstName?.trim(), lastName?.trim()].filter(Boolean).join(" ");
  return name || null;
}

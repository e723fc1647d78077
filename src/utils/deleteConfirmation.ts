import { DeleteNotConfirmedError } from "../services/storeErrors";

export type ConfirmableEntity =
  | "PROPERTY"
  | "RESIDENT"
  | "REQUEST"
  | "TRANSACTION"
  | "TEMPLATE";

export function deleteConfirmationPhrase(
  entity: ConfirmableEntity,
  id: number,
): string {
  return `DELETE ${entity} ${id}`;
}

export function isDeleteConfirmed(
  entity: ConfirmableEntity,
  id: number,
  confirmation: string | null | undefined,
): boolean {
  return confirmation === deleteConfirmationPhrase(entity, id);
}

/**
 * Guard for destructive store calls. The comparison is exact: no trimming,
 * no case folding.
 */
export function assertDeleteConfirmed(
  entity: ConfirmableEntity,
  id: number,
  confirmation: string | null | undefined,
): void {
  if (!isDeleteConfirmed(entity, id, confirmation)) {
    throw new DeleteNotConfirmedError(deleteConfirmationPhrase(entity, id));
  }
}

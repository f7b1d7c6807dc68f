import { CustomerProfile, Transaction } from '../../types/sales';

export interface ItemQuantityEdit {
  id: string;
  quantity: number;
}

export interface TransactionEdit extends Partial<CustomerProfile> {
  items?: ItemQuantityEdit[];
}

export type EditResult =
  | { ok: true; transaction: Transaction }
  | { ok: false; unknownItemIds: string[] };

/**
 * Build the edited copy of a transaction. Its id, date, event and the set of
 * items stay as they were; only quantities and customer attributes change.
 */
export function applyTransactionEdit(transaction: Transaction, edit: TransactionEdit): EditResult {
  const { items: itemEdits = [], ...profile } = edit;

  const quantities = new Map(itemEdits.map((item) => [item.id, item.quantity]));
  const unknownItemIds = [...quantities.keys()].filter(
    (id) => !transaction.items.some((item) => item.id === id)
  );
  if (unknownItemIds.length > 0) {
    return { ok: false, unknownItemIds };
  }

  return {
    ok: true,
    transaction: {
      ...transaction,
      ...profile,
      items: transaction.items.map((item) => ({
        ...item,
        quantity: quantities.get(item.id) ?? item.quantity,
      })),
    },
  };
}

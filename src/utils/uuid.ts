/**
 * Time-sortable session ids (UUID v7, RFC 9562)
 */

import { v7 } from "uuid";

export function uuidv7(): string {
  return v7();
}

import { v4 as uuidv4 } from 'uuid';

export function shortId(length = 8): string {
  return uuidv4().replace(/-/g, '').substring(0, length);
}

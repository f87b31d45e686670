import type { Party, PartyRole } from './types';
import { type MetadataSource, getString } from './attributes';

const PARTY_FIELDS: Array<{ role: PartyRole; name: string; email: string }> = [
  { role: 'author', name: 'Author', email: 'Author-email' },
  { role: 'maintainer', name: 'Maintainer', email: 'Maintainer-email' }
];

export function getParties(source: MetadataSource): Party[] {
  const parties: Party[] = [];
  for (const fields of PARTY_FIELDS) {
    const name = getString(source, fields.name);
    const email = getString(source, fields.email);
    if (!name && !email) continue;
    parties.push({
      type: 'person',
      name: name || undefined,
      role: fields.role,
      email: email || undefined
    });
  }
  return parties;
}

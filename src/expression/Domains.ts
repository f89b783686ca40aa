/**
 * Domain metadata: the spatial regions an expression is defined over, and how
 * two children's domains merge into their parent's.
 */

import { DomainError } from './Errors.js';
import { column, type Numeric } from '../numeric/Backend.js';

export type Domain = readonly string[];

/**
 * Secondary (and further) domain roles, e.g. { secondary: ['current collector'] }
 */
export type AuxiliaryDomains = Readonly<Record<string, Domain>>;

/**
 * Placeholder sizes used for shape inference before discretisation
 */
export const DOMAIN_SIZES: Readonly<Record<string, number>> = {
  'current collector': 3,
  'negative electrode': 5,
  'separator': 4,
  'positive electrode': 6,
  'negative particle': 7,
  'positive particle': 9
};

export function domainsEqual(left: Domain, right: Domain): boolean {
  return left.length === right.length && left.every((d, i) => d === right[i]);
}

/**
 * Combine the domains of a binary node's children
 */
export function combineDomains(left: Domain, right: Domain): Domain {
  if (domainsEqual(left, right)) return left;
  if (left.length === 0) return right;
  if (right.length === 0) return left;
  throw new DomainError('children must have same (or empty) domains', left, right);
}

/**
 * Merge auxiliary domains role by role. A role present on several children
 * must carry the same domain on each of them.
 */
export function combineAuxiliaryDomains(children: readonly { auxiliaryDomains: AuxiliaryDomains }[]): AuxiliaryDomains {
  const combined: Record<string, Domain> = {};
  for (const child of children) {
    for (const [role, domain] of Object.entries(child.auxiliaryDomains)) {
      if (domain.length === 0) continue;
      const existing = combined[role];
      if (existing === undefined) {
        combined[role] = domain;
      } else if (!domainsEqual(existing, domain)) {
        throw new DomainError(`children must have same (or empty) '${role}' auxiliary domains`, existing, domain);
      }
    }
  }
  return combined;
}

function fallbackSize(name: string): number {
  let sum = 0;
  for (const ch of name) sum += ch.charCodeAt(0);
  return (sum % 97) + 3;
}

export function domainSize(domain: Domain): number {
  if (domain.length === 0) return 1;
  return domain.reduce((total, d) => total + (DOMAIN_SIZES[d] ?? fallbackSize(d)), 0);
}

export function auxiliaryDomainsSize(auxiliaryDomains: AuxiliaryDomains): number {
  return Object.values(auxiliaryDomains).reduce((total, domain) => total * domainSize(domain), 1);
}

/**
 * NaN-filled value with the shape a node on these domains would have once
 * discretised. Nodes without a domain are scalars.
 */
export function evaluateForShapeUsingDomain(domain: Domain, auxiliaryDomains: AuxiliaryDomains = {}): Numeric {
  if (domain.length === 0) return NaN;
  const size = domainSize(domain) * auxiliaryDomainsSize(auxiliaryDomains);
  return column(new Array<number>(size).fill(NaN));
}

/**
 * targetRegistry.ts — Per-target URLs, content selectors and timeouts.
 *
 * The data lives in `targets.json` and is validated once, at module load.
 * Lookups never fail: an unknown identifier gets a synthesized configuration
 * built from the portal URL templates and the generic selectors, so the
 * scanner treats "unsupported target" exactly like "supported target with
 * nothing special-cased".
 */

import { z } from 'zod';
import type { Locator } from '../core/automation';
import type { IndicatorRole, TargetConfiguration } from '../core/types';
import targetsData from './targets.json';
import portalData from './portal.json';

// ─── Schemas ───────────────────────────────────────────────

export const locatorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('css'), selector: z.string().min(1) }),
  z.object({
    kind: z.literal('text'),
    text: z.string().min(1),
    within: z.string().min(1).optional(),
  }),
]);

const locatorListSchema = z.array(locatorSchema);

const selectorsSchema = z.object({
  noSlotsIndicator: locatorListSchema,
  slotIndicator: locatorListSchema,
  dateIndicator: locatorListSchema,
  loadingIndicator: locatorListSchema,
});

const urlTemplate = z.string().includes('{id}');

const registrySchema = z.object({
  portal: z.object({
    baseUrl: urlTemplate,
    appointmentUrl: urlTemplate,
    loginUrl: urlTemplate,
    dashboardUrl: urlTemplate,
  }),
  defaults: z.object({
    selectors: selectorsSchema,
    readySelector: z.string().min(1),
    navigationTimeoutMs: z.number().int().positive(),
  }),
  targets: z.array(
    z.object({
      id: z.string().regex(/^[a-z]{2,8}$/),
      name: z.string().min(1),
      selectors: selectorsSchema,
      readySelector: z.string().min(1),
      navigationTimeoutMs: z.number().int().positive(),
    }),
  ),
});

const portalSelectorsSchema = z.object({
  maintenance: locatorListSchema,
  cookieBanner: locatorListSchema,
  emailField: locatorListSchema,
  passwordField: locatorListSchema,
  submitControl: locatorListSchema,
  otpField: locatorListSchema,
  otpSubmit: locatorListSchema,
  loginSuccess: locatorListSchema,
  authenticatedProbe: locatorListSchema,
});

/** Ordered candidate lists the login flow and session probe try, first match wins. */
export type PortalSelectors = Readonly<Record<keyof z.infer<typeof portalSelectorsSchema>, readonly Locator[]>>;

// ─── Registry ──────────────────────────────────────────────

type RegistryData = z.infer<typeof registrySchema>;

export class TargetRegistry {
  private readonly data: RegistryData;
  private readonly known = new Map<string, TargetConfiguration>();

  constructor(raw: unknown) {
    this.data = registrySchema.parse(raw);

    for (const target of this.data.targets) {
      this.known.set(
        target.id,
        this.build(target.id, target.name, target.selectors, target.readySelector, target.navigationTimeoutMs),
      );
    }
  }

  /**
   * Configuration for `targetId` (case-insensitive).  Unknown ids get a
   * default named after the upper-cased id with URLs derived from it.
   */
  get(targetId: string): TargetConfiguration {
    const id = normalizeId(targetId);
    const hit = this.known.get(id);
    if (hit) return hit;

    const { defaults } = this.data;
    return this.build(
      id,
      id.toUpperCase(),
      defaults.selectors,
      defaults.readySelector,
      defaults.navigationTimeoutMs,
    );
  }

  isSupported(targetId: string): boolean {
    return this.known.has(normalizeId(targetId));
  }

  list(): Array<{ code: string; name: string }> {
    return [...this.known.values()].map((t) => ({ code: t.id, name: t.name }));
  }

  // ── Internals ──────────────────────────────────────────

  private build(
    id: string,
    name: string,
    selectors: Record<IndicatorRole, Locator[]>,
    readySelector: string,
    navigationTimeoutMs: number,
  ): TargetConfiguration {
    const { portal } = this.data;
    const segment = encodeURIComponent(id);
    const fill = (template: string) => template.split('{id}').join(segment);

    return Object.freeze({
      id,
      name,
      baseUrl: fill(portal.baseUrl),
      appointmentUrl: fill(portal.appointmentUrl),
      loginUrl: fill(portal.loginUrl),
      dashboardUrl: fill(portal.dashboardUrl),
      selectors: Object.freeze({
        noSlotsIndicator: Object.freeze([...selectors.noSlotsIndicator]),
        slotIndicator: Object.freeze([...selectors.slotIndicator]),
        dateIndicator: Object.freeze([...selectors.dateIndicator]),
        loadingIndicator: Object.freeze([...selectors.loadingIndicator]),
      }),
      readySelector,
      navigationTimeoutMs,
    });
  }
}

function normalizeId(targetId: string): string {
  return targetId.trim().toLowerCase();
}

// ─── Shared instances ──────────────────────────────────────

/** Registry built from the bundled `targets.json`. */
export const targetRegistry = new TargetRegistry(targetsData);

/** Login-flow selector candidates from the bundled `portal.json`. */
export const portalSelectors: PortalSelectors = portalSelectorsSchema.parse(portalData);

/** Shorthand for `targetRegistry.get(targetId)`. */
export function getTargetConfiguration(targetId: string): TargetConfiguration {
  return targetRegistry.get(targetId);
}

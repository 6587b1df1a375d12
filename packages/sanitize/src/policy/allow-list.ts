import { attribute, type Attribute, type ElementNode } from "@sieve/markup";
import { AllowListConfigSchema, parseConfig } from "../config.js";
import { ALL_TAGS } from "../constants.js";
import type { AllowListConfig, PolicyOracle } from "../types.js";
import { extractScheme } from "./protocols.js";

type ProtocolRules = ReadonlyMap<string, ReadonlyMap<string, ReadonlySet<string>>>;

/**
 * PolicyOracle backed by a declarative allow-list. Everything not listed is
 * unsafe. Instances are immutable and may be shared across cleaners.
 */
export class AllowListPolicy implements PolicyOracle {
  private readonly tags: ReadonlySet<string>;
  private readonly attributes: ReadonlyMap<string, ReadonlySet<string>>;
  private readonly globalAttributes: ReadonlySet<string>;
  private readonly enforced: ReadonlyMap<string, readonly Attribute[]>;
  private readonly protocols: ProtocolRules;
  private readonly preserveRelativeLinks: boolean;

  constructor(config: AllowListConfig) {
    const resolved = parseConfig(AllowListConfigSchema, config, "allow-list");

    const tags = new Set(resolved.tags);
    const attributes = new Map<string, ReadonlySet<string>>();
    for (const [tag, names] of Object.entries(resolved.attributes)) {
      if (tag === ALL_TAGS) continue;
      attributes.set(tag, new Set(names));
      tags.add(tag);
    }

    const enforced = new Map<string, readonly Attribute[]>();
    for (const [tag, values] of Object.entries(resolved.enforcedAttributes)) {
      enforced.set(
        tag,
        Object.freeze(Object.entries(values).map(([name, value]) => attribute(name, value))),
      );
      tags.add(tag);
    }

    const protocols = new Map<string, ReadonlyMap<string, ReadonlySet<string>>>();
    for (const [tag, byAttribute] of Object.entries(resolved.protocols)) {
      protocols.set(
        tag,
        new Map(
          Object.entries(byAttribute).map(([name, schemes]): [string, ReadonlySet<string>] => [
            name,
            new Set(schemes),
          ]),
        ),
      );
    }

    this.tags = tags;
    this.attributes = attributes;
    this.globalAttributes = new Set(resolved.attributes[ALL_TAGS] ?? []);
    this.enforced = enforced;
    this.protocols = protocols;
    this.preserveRelativeLinks = resolved.preserveRelativeLinks;
  }

  isSafeTag(tagName: string): boolean {
    return this.tags.has(tagName);
  }

  isSafeAttribute(tagName: string, _element: ElementNode, attr: Attribute): boolean {
    if (!this.isSafeTag(tagName)) return false;

    const name = attr.name.toLowerCase();
    const permitted = this.attributes.get(tagName)?.has(name) || this.globalAttributes.has(name);
    if (!permitted) return false;

    const schemes = this.protocols.get(tagName)?.get(name);
    return schemes === undefined || this.hasPermittedScheme(attr.value, schemes);
  }

  enforcedAttributes(tagName: string): readonly Attribute[] {
    return this.enforced.get(tagName) ?? [];
  }

  private hasPermittedScheme(value: string, schemes: ReadonlySet<string>): boolean {
    const scheme = extractScheme(value);
    if (scheme === undefined) return this.preserveRelativeLinks;
    return schemes.has(scheme);
  }
}

import type { PriceTerms } from "./types.js";

// ---------------------------------------------------------------------------
// Fluent price builder
// ---------------------------------------------------------------------------

export class PriceBuilder {
  private p: Partial<PriceTerms> = {};

  /** Amount in the asset's smallest unit. */
  costs(amount: string | bigint): this {
    this.p.amount = amount.toString();
    return this;
  }

  asset(address: string, decimals: number): this {
    this.p.assetAddress = address;
    this.p.assetDecimals = decimals;
    return this;
  }

  on(network: string): this {
    this.p.network = network;
    return this;
  }

  domain(name: string, version: string): this {
    this.p.signingDomainName = name;
    this.p.signingDomainVersion = version;
    return this;
  }

  build(): PriceTerms {
    const {
      amount,
      assetAddress,
      assetDecimals,
      network,
      signingDomainName,
      signingDomainVersion,
    } = this.p;
    if (amount === undefined) throw new Error("PriceBuilder: amount is required (.costs())");
    if (assetAddress === undefined || assetDecimals === undefined) {
      throw new Error("PriceBuilder: asset is required (.asset())");
    }
    if (network === undefined) throw new Error("PriceBuilder: network is required (.on())");
    if (signingDomainName === undefined || signingDomainVersion === undefined) {
      throw new Error("PriceBuilder: signing domain is required (.domain())");
    }
    return {
      amount,
      assetAddress,
      assetDecimals,
      network,
      signingDomainName,
      signingDomainVersion,
    };
  }
}

/** Shorthand entry point: `price().costs(...).asset(...).on(...).domain(...).build()` */
export function price(): PriceBuilder {
  return new PriceBuilder();
}

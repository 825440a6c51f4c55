import type { Asset } from '../types';
import { canonicalEcosystem, normalizePackageName } from '../versioning';

export class AssetIndex {
    private readonly byPackage = new Map<string, Asset[]>();

    constructor(assets: readonly Asset[]) {
        for (const asset of assets) {
            const key = packageIndexKey(asset.ecosystem, asset.name);
            const bucket = this.byPackage.get(key);
            if (bucket) {
                bucket.push(asset);
            } else {
                this.byPackage.set(key, [asset]);
            }
        }
    }

    lookup(ecosystem: string, packageName: string): readonly Asset[] {
        return this.byPackage.get(packageIndexKey(ecosystem, packageName)) ?? [];
    }

    get size(): number {
        return this.byPackage.size;
    }
}

export function packageIndexKey(ecosystem: string, name: string): string {
    const canonical = canonicalEcosystem(ecosystem);
    return `${canonical}|${normalizePackageName(canonical, name)}`;
}

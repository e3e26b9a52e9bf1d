import {
  type FetchableAssetKind,
  isFetchableAssetKind,
} from '../common/interfaces/pricing/asset-kind.interfaces';
import type { ITrackedAsset } from '../common/interfaces/storage/portfolio-snapshot-store.interfaces';

export interface ISnapshotAsset extends ITrackedAsset {
  readonly kind: FetchableAssetKind;
}

const isSnapshotAsset = (asset: ITrackedAsset): asset is ISnapshotAsset =>
  isFetchableAssetKind(asset.kind);

/** Fetchable assets only, first occurrence of each `userAssetId` wins. */
export const selectSnapshotAssets = (
  trackedAssets: readonly ITrackedAsset[],
): readonly ISnapshotAsset[] => {
  const seenIds: Set<number> = new Set<number>();
  const selected: ISnapshotAsset[] = [];

  for (const asset of trackedAssets) {
    if (seenIds.has(asset.userAssetId) || !isSnapshotAsset(asset)) {
      continue;
    }

    seenIds.add(asset.userAssetId);
    selected.push(asset);
  }

  return selected;
};

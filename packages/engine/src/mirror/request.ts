import type { MirrorRequest, RequestPlan } from './types.js';

/** A request that does nothing beyond the default whole-drive mirror. */
export function emptyRequest(): MirrorRequest {
  return {
    items: [],
    photosAll: false,
    photosAlbums: [],
    listPhotos: false,
    listAlbumAssets: [],
    listAlbums: false,
  };
}

/**
 * Work out which stages a request runs.
 *
 * The drive is mirrored when items are named, or when nothing else (no photo
 * download, no listing) was asked for. A destination is needed exactly when
 * something is downloaded; listing alone needs none.
 */
export function planRequest(request: MirrorRequest): RequestPlan {
  const photosDownload = request.photosAll || request.photosAlbums.length > 0;
  const listing =
    request.listPhotos || request.listAlbumAssets.length > 0 || request.listAlbums;
  const driveDownload = request.items.length > 0 || (!photosDownload && !listing);

  return {
    driveDownload,
    photosDownload,
    listing,
    requiresDestination: driveDownload || photosDownload,
  };
}

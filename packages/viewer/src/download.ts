/**
 * OBJ downloads
 *
 * Object URLs hold their Blob until revoked, so each download is returned
 * with the function that releases it.
 */

import { exportTilingToObj, type ObjExportOptions, type TilingMesh } from '@uniform-tilings/core';

export interface ObjDownload {
  url: string;
  filename: string;
  revoke(): void;
}

export function createObjDownload(
  mesh: TilingMesh,
  filename: string,
  options: ObjExportOptions = {}
): ObjDownload {
  const text = exportTilingToObj(mesh, options);
  const url = URL.createObjectURL(new Blob([text], { type: 'text/plain' }));
  return {
    url,
    filename,
    revoke: () => URL.revokeObjectURL(url),
  };
}

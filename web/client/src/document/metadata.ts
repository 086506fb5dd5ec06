export interface ExifFields {
  cameraMake?: string;
  cameraModel?: string;
  dateTime?: string;
  exposureTime?: string;
  fNumber?: string;
  iso?: number;
  focalLength?: string;
  gpsLatitude?: number;
  gpsLongitude?: number;
}

export interface MetadataSnapshot {
  fileName: string;
  filePath: string;
  format: string;
  width: number;
  height: number;
  fileSize: number;
  colorType: string;
  exif: ExifFields | null;
}

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

export function formatFileSize(bytes: number): string {
  if (bytes >= GB) {
    return `${(bytes / GB).toFixed(2)} GB`;
  }
  if (bytes >= MB) {
    return `${(bytes / MB).toFixed(2)} MB`;
  }
  if (bytes >= KB) {
    return `${(bytes / KB).toFixed(1)} KB`;
  }
  return `${bytes} B`;
}

export function formatResolution(width: number, height: number): string {
  return `${width} × ${height}`;
}

export function cameraDisplay(exif: ExifFields): string | null {
  const { cameraMake: make, cameraModel: model } = exif;
  if (make && model) {
    return model.startsWith(make) ? model : `${make} ${model}`;
  }
  return make ?? model ?? null;
}

export function gpsDisplay(exif: ExifFields): string | null {
  if (exif.gpsLatitude === undefined || exif.gpsLongitude === undefined) {
    return null;
  }
  return `${exif.gpsLatitude.toFixed(5)}, ${exif.gpsLongitude.toFixed(5)}`;
}

export interface MetadataRow {
  label: string;
  value: string;
}

/** Label/value pairs in panel order; EXIF rows only for fields that are present. */
export function metadataRows(snapshot: MetadataSnapshot): MetadataRow[] {
  const rows: MetadataRow[] = [
    { label: "File name", value: snapshot.fileName },
    { label: "Format", value: snapshot.format },
    { label: "Resolution", value: formatResolution(snapshot.width, snapshot.height) },
    { label: "File size", value: formatFileSize(snapshot.fileSize) },
    { label: "Color type", value: snapshot.colorType },
  ];
  const exif = snapshot.exif;
  if (!exif) {
    return rows;
  }
  const camera = cameraDisplay(exif);
  if (camera) rows.push({ label: "Camera", value: camera });
  if (exif.dateTime) rows.push({ label: "Date taken", value: exif.dateTime });
  if (exif.exposureTime) rows.push({ label: "Exposure", value: exif.exposureTime });
  if (exif.fNumber) rows.push({ label: "Aperture", value: exif.fNumber });
  if (exif.iso !== undefined) rows.push({ label: "ISO", value: String(exif.iso) });
  if (exif.focalLength) rows.push({ label: "Focal length", value: exif.focalLength });
  const gps = gpsDisplay(exif);
  if (gps) rows.push({ label: "GPS", value: gps });
  return rows;
}

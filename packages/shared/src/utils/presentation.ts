/**
 * Derived presentation fields. Recomputed on every read, never stored.
 */

import { QR_CONFIG } from "../constants/index.js";
import type { UrlRecord, UrlView } from "../types/index.js";

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

export function buildShortUrl(baseUrl: string, id: string): string {
  return `${trimBase(baseUrl)}/${id}`;
}

export function buildQrCodeUrl(baseUrl: string, id: string): string {
  return `${trimBase(baseUrl)}/urls/${id}/qr`;
}

export function toUrlView(record: UrlRecord, baseUrl: string): UrlView {
  return {
    ...record,
    shortUrl: buildShortUrl(baseUrl, record.id),
    qrCodeUrl: buildQrCodeUrl(baseUrl, record.id),
  };
}

/**
 * Clamp a requested QR size. Missing or non-numeric input gets the default.
 */
export function clampQrSize(size: number | undefined): number {
  if (size === undefined || !Number.isFinite(size)) {
    return QR_CONFIG.DEFAULT_SIZE;
  }
  return Math.min(QR_CONFIG.MAX_SIZE, Math.max(QR_CONFIG.MIN_SIZE, Math.trunc(size)));
}

/**
 * External generator URL for a QR image encoding `data`.
 *
 * @example
 * ```ts
 * buildQrImageUrl("https://th.example/abc", 200)
 * // "https://api.qrserver.com/v1/create-qr-code/?size=200x200&data=https%3A%2F%2Fth.example%2Fabc"
 * ```
 */
export function buildQrImageUrl(
  data: string,
  size: number,
  generatorUrl: string = QR_CONFIG.GENERATOR_URL
): string {
  return `${generatorUrl}?size=${size}x${size}&data=${encodeURIComponent(data)}`;
}

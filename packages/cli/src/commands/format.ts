// pattern: Functional Core
// Rendering helpers for directory listings.

import type { Stats } from "node:fs";

const SIZE_UNITS = ["B", "K", "M", "G", "T"];

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
];

/**
 * Human-readable size: whole numbers print bare (`2K`), fractions with one
 * decimal (`1.5K`)
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return Number.isInteger(size) ? `${size}${unit}` : `${size.toFixed(1)}${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)}P`;
}

/**
 * `Oct 19 10:26`, in local time
 */
export function formatModified(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, "0");
  return `${MONTHS[date.getMonth()] ?? "???"} ${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

function typeChar(stats: Stats): string {
  if (stats.isDirectory()) return "d";
  if (stats.isSymbolicLink()) return "l";
  if (stats.isCharacterDevice()) return "c";
  if (stats.isBlockDevice()) return "b";
  if (stats.isFIFO()) return "p";
  if (stats.isSocket()) return "s";
  return "-";
}

/**
 * `ls -l` style mode string, e.g. `drwxr-xr-x`
 */
export function formatMode(stats: Stats): string {
  let perms = "";
  for (let shift = 8; shift >= 0; shift--) {
    perms += stats.mode & (1 << shift) ? "rwx".charAt((8 - shift) % 3) : "-";
  }
  return `${typeChar(stats)}${perms}`;
}

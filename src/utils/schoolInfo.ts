// src/utils/schoolInfo.ts
import type { SchoolInfo } from '../validators/letterRequestSchema';

/**
 * Clear kelurahan/kecamatan when the street address already contains them,
 * so the letterhead does not print "Tunjungtirto, Tunjungtirto".
 * The address itself is never edited. Returns a copy.
 */
export function normalizeSchoolInfo(school: SchoolInfo): SchoolInfo {
  const address = school.alamat_jalan;
  const normalized: SchoolInfo = { ...school };

  if (school.kelurahan && address.includes(school.kelurahan)) {
    normalized.kelurahan = undefined;
  }

  if (school.kecamatan && address.includes(school.kecamatan)) {
    normalized.kecamatan = undefined;
  }

  return normalized;
}

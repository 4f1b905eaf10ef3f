// src/services/letters/mappers.ts
import { v4 as uuidv4 } from 'uuid';
import { formatIndonesianDate, formatNumericDate, parseIndonesianDate } from '../../utils/dateParser';
import { PDF_EXTENSION, toFilenameComponent } from '../../utils/filename';
import { normalizeSchoolInfo } from '../../utils/schoolInfo';
import type {
  GenerateLetterRequest,
  LembarPersetujuanRequest,
  LetterRequest,
  SuratTugasRequest,
} from '../../validators/letterRequestSchema';

export const LEMBAR_PERSETUJUAN_NUMBER = 'PKL/PST/001';
export const LEMBAR_PERSETUJUAN_SUBJECT = 'LEMBAR PERSETUJUAN';

/*
 * Every external request shape has exactly one conversion into the canonical
 * LetterRequest. School info is normalized here, before rendering.
 */

export function fromSuratTugas(request: SuratTugasRequest): LetterRequest {
  return {
    template_type: 'surat_tugas',
    nomor_surat: request.nomor_surat,
    perihal: request.perihal,
    tanggal_surat: request.tanggal_surat,
    tempat_surat: request.tempat_surat,
    school_info: normalizeSchoolInfo(request.school_info),
    penandatangan: request.penandatangan,
    content: {
      assignees: request.assignees,
      details: request.details,
      pembuka: request.pembuka,
      penutup: request.penutup,
    },
  };
}

/**
 * The approval sheet carries no number or date of its own; it is dated
 * `now` and signed by the first student.
 */
export function fromLembarPersetujuan(request: LembarPersetujuanRequest, now: Date = new Date()): LetterRequest {
  return {
    template_type: 'lembar_persetujuan',
    nomor_surat: LEMBAR_PERSETUJUAN_NUMBER,
    perihal: LEMBAR_PERSETUJUAN_SUBJECT,
    tanggal_surat: formatIndonesianDate(now),
    tempat_surat: undefined,
    school_info: normalizeSchoolInfo(request.school_info),
    penandatangan: request.students[0],
    content: {
      students: request.students,
      nama_perusahaan: request.nama_perusahaan,
      tempat_tanggal: request.tempat_tanggal,
    },
  };
}

// Already canonical; only the school info is normalized
export function fromRenderRequest(request: LetterRequest): LetterRequest {
  return {
    ...request,
    school_info: normalizeSchoolInfo(request.school_info),
  };
}

export function fromGenerateRequest(request: GenerateLetterRequest): LetterRequest {
  const { type, data } = request;

  return {
    template_type: type,
    nomor_surat: data.nomor,
    perihal: data.perihal,
    tanggal_surat: data.tanggal,
    tempat_surat: data.tempat,
    school_info: normalizeSchoolInfo(data.school_info),
    penandatangan: { nama: data.penandatangan.nama, jabatan: data.penandatangan.jabatan },
    content: {
      penerima: data.penerima,
      isi: data.isi,
    },
  };
}

// SURAT_TUGAS_{FIRST_ASSIGNEE}_{dd-mm-yyyy}.pdf
export function suratTugasFilename(request: SuratTugasRequest): string {
  const assignee = toFilenameComponent(request.assignees[0].nama);
  const date = toFilenameComponent(parseIndonesianDate(request.tanggal_surat));
  return `SURAT_TUGAS_${assignee}_${date}${PDF_EXTENSION}`;
}

// LEMBAR_PERSETUJUAN_{COMPANY}_{dd-mm-yyyy}.pdf
export function lembarPersetujuanFilename(request: LembarPersetujuanRequest, now: Date = new Date()): string {
  const company = toFilenameComponent(request.nama_perusahaan);
  return `LEMBAR_PERSETUJUAN_${company}_${formatNumericDate(now)}${PDF_EXTENSION}`;
}

// {nomor with / replaced by -}_{type}.pdf; other characters are left to the sanitizer
export function generatedLetterFilename(request: GenerateLetterRequest): string {
  return `${request.data.nomor.split('/').join('-')}_${request.type}${PDF_EXTENSION}`;
}

// {template_type}_{8 hex chars}.pdf
export function defaultFilename(templateType: string): string {
  return `${templateType}_${uuidv4().replace(/-/g, '').slice(0, 8)}${PDF_EXTENSION}`;
}

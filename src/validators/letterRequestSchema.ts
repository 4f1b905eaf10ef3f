// src/validators/letterRequestSchema.ts

import { z } from 'zod';

/**
 * Optional free text; `null` from the client is treated as absent
 */
const optionalText = () =>
  z
    .string()
    .nullish()
    .transform((value) => value ?? undefined);

const requiredText = (field: string) => z.string().min(1, `${field} is required`);

// Letterhead data (kop surat)
export const schoolInfoSchema = z.object({
  nama_sekolah: requiredText('nama_sekolah'),
  alamat_jalan: requiredText('alamat_jalan'),
  kelurahan: optionalText(),
  kecamatan: optionalText(),
  kab_kota: requiredText('kab_kota'),
  provinsi: requiredText('provinsi'),
  kode_pos: optionalText(),
  telepon: optionalText(),
  email: optionalText(),
  website: optionalText(),
  logo_url: optionalText(),
});

// Signatory, assignee, student or recipient
export const personSchema = z.object({
  nama: requiredText('nama'),
  jabatan: optionalText(),
  nip: optionalText(),
  pangkat: optionalText(),
  instansi: optionalText(),
});

// Detail row such as "Waktu : 08.00"
export const keyValueItemSchema = z.object({
  label: z.string(),
  value: z.string(),
  separator: z.string().default(':'),
});

/**
 * Canonical request consumed by the renderer. Every external request shape
 * is converted into this one.
 */
export const letterRequestSchema = z.object({
  template_type: requiredText('template_type'),
  nomor_surat: requiredText('nomor_surat'),
  perihal: z.string().default('SURAT TUGAS'),
  tanggal_surat: requiredText('tanggal_surat'),
  tempat_surat: optionalText(),
  school_info: schoolInfoSchema,
  penandatangan: personSchema,
  content: z.record(z.unknown()),
});

export const renderLetterRequestSchema = letterRequestSchema.extend({
  filename: optionalText(),
});

export const suratTugasRequestSchema = z.object({
  nomor_surat: requiredText('nomor_surat'),
  tanggal_surat: requiredText('tanggal_surat'),
  tempat_surat: optionalText(),
  perihal: z.string().default('SURAT TUGAS'),
  school_info: schoolInfoSchema,
  penandatangan: personSchema,
  assignees: z.array(personSchema).min(1, 'At least one assignee is required'),
  details: z.array(keyValueItemSchema),
  pembuka: optionalText(),
  penutup: optionalText(),
});

export const lembarPersetujuanRequestSchema = z.object({
  school_info: schoolInfoSchema,
  students: z.array(personSchema).min(1, 'At least one student is required'),
  nama_perusahaan: requiredText('nama_perusahaan'),
  tempat_tanggal: optionalText(),
});

export const OFFICIAL_LETTER_TYPES = ['surat_dinas', 'surat_edaran', 'surat_pemberitahuan'] as const;

export const officialLetterTypeSchema = z.enum(OFFICIAL_LETTER_TYPES);

export const letterDataSchema = z.object({
  nomor: requiredText('nomor'),
  tanggal: requiredText('tanggal'),
  perihal: requiredText('perihal'),
  tempat: optionalText(),
  penerima: z.object({
    nama: requiredText('nama'),
    jabatan: z.string().default(''),
  }),
  isi: requiredText('isi'),
  penandatangan: z.object({
    nama: requiredText('nama'),
    jabatan: requiredText('jabatan'),
  }),
  school_info: schoolInfoSchema,
});

export const generateLetterRequestSchema = z.object({
  type: officialLetterTypeSchema,
  data: letterDataSchema,
});

export type SchoolInfo = z.infer<typeof schoolInfoSchema>;
export type LetterRequest = z.infer<typeof letterRequestSchema>;
export type SuratTugasRequest = z.infer<typeof suratTugasRequestSchema>;
export type LembarPersetujuanRequest = z.infer<typeof lembarPersetujuanRequestSchema>;
export type GenerateLetterRequest = z.infer<typeof generateLetterRequestSchema>;

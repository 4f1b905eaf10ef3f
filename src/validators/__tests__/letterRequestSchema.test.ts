import { describe, it, expect } from 'vitest';
import {
  generateLetterRequestSchema,
  keyValueItemSchema,
  lembarPersetujuanRequestSchema,
  letterRequestSchema,
  schoolInfoSchema,
} from '../letterRequestSchema';
import { parseBody } from '../parseBody';
import { RequestValidationError } from '../../services/letters/errors';

const school = {
  nama_sekolah: 'SMK Negeri 9 Contoh',
  alamat_jalan: 'Jl. Melati No. 5',
  kab_kota: 'Kota Malang',
  provinsi: 'Jawa Timur',
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('letter request schemas', () => {
  it('treats null optional text as absent', () => {
    const parsed = schoolInfoSchema.parse({ ...school, kelurahan: null, kode_pos: '65111' });

    expect(parsed.kelurahan).toBeUndefined();
    expect(parsed.kode_pos).toBe('65111');
  });

  it('defaults the detail separator to a colon', () => {
    expect(keyValueItemSchema.parse({ label: 'Waktu', value: '08.00' })).toEqual({
      label: 'Waktu',
      value: '08.00',
      separator: ':',
    });
  });

  it('defaults the subject of a canonical request', () => {
    const parsed = letterRequestSchema.parse({
      template_type: 'surat_dinas',
      nomor_surat: '001/SMK9/2024',
      tanggal_surat: '2 Mei 2024',
      school_info: school,
      penandatangan: { nama: 'Kepala Sekolah' },
      content: {},
    });

    expect(parsed.perihal).toBe('SURAT TUGAS');
  });

  it('requires at least one student', () => {
    const result = lembarPersetujuanRequestSchema.safeParse({
      school_info: school,
      students: [],
      nama_perusahaan: 'PT Contoh',
    });

    expect(result.success).toBe(false);
  });

  it('accepts only official letter types for /generate', () => {
    const data = {
      nomor: '001/SMK9/2024',
      tanggal: '2 Mei 2024',
      perihal: 'Rapat',
      penerima: { nama: 'Wali Murid' },
      isi: 'Isi surat',
      penandatangan: { nama: 'Kepala Sekolah', jabatan: 'Kepala' },
      school_info: school,
    };

    expect(generateLetterRequestSchema.safeParse({ type: 'surat_tugas', data }).success).toBe(false);

    const parsed = generateLetterRequestSchema.parse({ type: 'surat_pemberitahuan', data });
    expect(parsed.data.penerima.jabatan).toBe('');
  });
});

describe('parseBody', () => {
  it('returns the parsed value', () => {
    const parsed = parseBody(keyValueItemSchema, { label: 'Tempat', value: 'Aula', separator: '-' });

    expect(parsed).toEqual({ label: 'Tempat', value: 'Aula', separator: '-' });
  });

  it('reports every issue with its dotted path', () => {
    const error = captureError(() =>
      parseBody(schoolInfoSchema, { ...school, nama_sekolah: '', alamat_jalan: 7 }, 'trace-1')
    );

    expect(error).toBeInstanceOf(RequestValidationError);
    if (!(error instanceof RequestValidationError)) return;
    expect(error.statusCode).toBe(422);
    expect(error.traceId).toBe('trace-1');
    expect(error.issues).toEqual([
      { path: 'nama_sekolah', message: 'nama_sekolah is required' },
      { path: 'alamat_jalan', message: 'Expected string, received number' },
    ]);
  });

  it('labels a body that is not an object', () => {
    const error = captureError(() => parseBody(schoolInfoSchema, 'not an object'));

    expect(error).toBeInstanceOf(RequestValidationError);
    if (!(error instanceof RequestValidationError)) return;
    expect(error.issues).toEqual([{ path: '(body)', message: 'Expected object, received string' }]);
  });
});

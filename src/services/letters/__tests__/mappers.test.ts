import { describe, it, expect } from 'vitest';
import {
  defaultFilename,
  fromGenerateRequest,
  fromLembarPersetujuan,
  fromRenderRequest,
  fromSuratTugas,
  generatedLetterFilename,
  LEMBAR_PERSETUJUAN_NUMBER,
  lembarPersetujuanFilename,
  suratTugasFilename,
} from '../mappers';
import { generateRequest, lembarPersetujuanRequest, letterRequest, suratTugasRequest } from './fixtures/letters';

describe('fromSuratTugas', () => {
  it('maps to the surat_tugas template with assignees and details in content', () => {
    const letter = fromSuratTugas(suratTugasRequest);

    expect(letter.template_type).toBe('surat_tugas');
    expect(letter.nomor_surat).toBe('800/123/SMK9/2024');
    expect(letter.tanggal_surat).toBe('1 Juli 2024');
    expect(letter.penandatangan).toBe(suratTugasRequest.penandatangan);
    expect(letter.content).toEqual({
      assignees: suratTugasRequest.assignees,
      details: suratTugasRequest.details,
      pembuka: undefined,
      penutup: undefined,
    });
  });

  it('normalizes school info before rendering', () => {
    const letter = fromSuratTugas(suratTugasRequest);

    expect(letter.school_info.kelurahan).toBeUndefined();
    expect(letter.school_info.kecamatan).toBe('Singosari');
    expect(suratTugasRequest.school_info.kelurahan).toBe('Tunjungtirto');
  });
});

describe('fromLembarPersetujuan', () => {
  it('dates the sheet and signs it with the first student', () => {
    const letter = fromLembarPersetujuan(lembarPersetujuanRequest, new Date(2026, 0, 12));

    expect(letter.template_type).toBe('lembar_persetujuan');
    expect(letter.nomor_surat).toBe(LEMBAR_PERSETUJUAN_NUMBER);
    expect(letter.perihal).toBe('LEMBAR PERSETUJUAN');
    expect(letter.tanggal_surat).toBe('12 Januari 2026');
    expect(letter.penandatangan.nama).toBe('Ahmad Fauzi');
    expect(letter.content).toEqual({
      students: lembarPersetujuanRequest.students,
      nama_perusahaan: 'PT Maju Jaya',
      tempat_tanggal: 'Malang, 1 Juli 2024',
    });
  });
});

describe('fromRenderRequest', () => {
  it('keeps the canonical fields and normalizes school info', () => {
    const letter = fromRenderRequest({
      ...letterRequest,
      school_info: { ...letterRequest.school_info, alamat_jalan: 'Jl. Test, Tunjungtirto' },
    });

    expect(letter.template_type).toBe('surat_dinas');
    expect(letter.content).toBe(letterRequest.content);
    expect(letter.school_info.kelurahan).toBeUndefined();
    expect(letter.school_info.kecamatan).toBe('Singosari');
  });
});

describe('fromGenerateRequest', () => {
  it('uses the letter type as template and moves recipient and body into content', () => {
    const letter = fromGenerateRequest(generateRequest);

    expect(letter.template_type).toBe('surat_edaran');
    expect(letter.nomor_surat).toBe('421/015/SMK9/2024');
    expect(letter.tanggal_surat).toBe('12 Januari 2024');
    expect(letter.tempat_surat).toBe('Malang');
    expect(letter.penandatangan).toEqual({ nama: 'Drs. Bambang Sutrisno, M.Pd.', jabatan: 'Kepala Sekolah' });
    expect(letter.content).toEqual({
      penerima: { nama: 'Orang Tua/Wali Siswa', jabatan: '' },
      isi: generateRequest.data.isi,
    });
    expect(letter.school_info.kelurahan).toBeUndefined();
  });
});

describe('filenames', () => {
  it('names a surat tugas after the first assignee and the letter date', () => {
    expect(suratTugasFilename(suratTugasRequest)).toBe(
      'SURAT_TUGAS_INASNI_DYAH_RAHMATIKA_S.PD._01-07-2024.pdf'
    );
  });

  it('keeps the mechanical date fallback in the filename', () => {
    expect(suratTugasFilename({ ...suratTugasRequest, tanggal_surat: '2024/07/01' })).toBe(
      'SURAT_TUGAS_INASNI_DYAH_RAHMATIKA_S.PD._2024-07-01.pdf'
    );
  });

  it('names an approval sheet after the company and the day it was made', () => {
    expect(lembarPersetujuanFilename(lembarPersetujuanRequest, new Date(2026, 0, 12))).toBe(
      'LEMBAR_PERSETUJUAN_PT_MAJU_JAYA_12-01-2026.pdf'
    );
  });

  it('names an official letter after its number and type', () => {
    expect(generatedLetterFilename(generateRequest)).toBe('421-015-SMK9-2024_surat_edaran.pdf');
  });

  it('defaults to the template type and a short random suffix', () => {
    expect(defaultFilename('surat_dinas')).toMatch(/^surat_dinas_[0-9a-f]{8}\.pdf$/);
  });
});

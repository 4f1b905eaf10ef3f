import fs from 'fs';
import os from 'os';
import path from 'path';
import type {
  GenerateLetterRequest,
  LembarPersetujuanRequest,
  LetterRequest,
  SchoolInfo,
  SuratTugasRequest,
} from '../../../../validators/letterRequestSchema';

export const schoolInfo: SchoolInfo = {
  nama_sekolah: 'SMK Negeri 9 Contoh',
  alamat_jalan: 'Jl. Raya Tunjungtirto No. 1, Tunjungtirto',
  kelurahan: 'Tunjungtirto',
  kecamatan: 'Singosari',
  kab_kota: 'Kabupaten Malang',
  provinsi: 'Jawa Timur',
  kode_pos: '65153',
  telepon: '0341-000000',
  email: 'info@smkn9contoh.sch.id',
  website: 'smkn9contoh.sch.id',
  logo_url: 'logo.png',
};

export const suratTugasRequest: SuratTugasRequest = {
  nomor_surat: '800/123/SMK9/2024',
  tanggal_surat: '1 Juli 2024',
  tempat_surat: 'Malang',
  perihal: 'SURAT TUGAS',
  school_info: schoolInfo,
  penandatangan: {
    nama: 'Drs. Bambang Sutrisno, M.Pd.',
    jabatan: 'Kepala Sekolah',
    nip: '196501011990031001',
    pangkat: 'Pembina Tk. I',
  },
  assignees: [
    { nama: 'Inasni Dyah Rahmatika, S.Pd.', jabatan: 'Guru Produktif', nip: '199001012019032001' },
    { nama: 'Rudi Hartono, S.Kom.', jabatan: 'Guru Produktif' },
  ],
  details: [
    { label: 'Hari/Tanggal', value: 'Senin, 8 Juli 2024', separator: ':' },
    { label: 'Tempat', value: 'PT Maju Jaya', separator: ':' },
  ],
  pembuka: undefined,
  penutup: undefined,
};

export const lembarPersetujuanRequest: LembarPersetujuanRequest = {
  school_info: schoolInfo,
  students: [
    { nama: 'Ahmad Fauzi', nip: '2122001', jabatan: 'XII TKJ 1' },
    { nama: 'Siti Aminah', nip: '2122002', jabatan: 'XII TKJ 1' },
  ],
  nama_perusahaan: 'PT Maju Jaya',
  tempat_tanggal: 'Malang, 1 Juli 2024',
};

export const generateRequest: GenerateLetterRequest = {
  type: 'surat_edaran',
  data: {
    nomor: '421/015/SMK9/2024',
    tanggal: '12 Januari 2024',
    perihal: 'Libur Semester Genap',
    tempat: 'Malang',
    penerima: { nama: 'Orang Tua/Wali Siswa', jabatan: '' },
    isi: 'Diberitahukan bahwa libur semester dimulai tanggal 20 Juni 2024.\n\nKegiatan belajar dimulai kembali tanggal 15 Juli 2024.',
    penandatangan: { nama: 'Drs. Bambang Sutrisno, M.Pd.', jabatan: 'Kepala Sekolah' },
    school_info: schoolInfo,
  },
};

export const letterRequest: LetterRequest = {
  template_type: 'surat_dinas',
  nomor_surat: '005/010/SMK9/2024',
  perihal: 'Undangan Rapat Komite',
  tanggal_surat: '3 Maret 2024',
  tempat_surat: 'Malang',
  school_info: schoolInfo,
  penandatangan: { nama: 'Drs. Bambang Sutrisno, M.Pd.', jabatan: 'Kepala Sekolah' },
  content: {
    penerima: { nama: 'Ketua Komite Sekolah', jabatan: '' },
    isi: 'Dengan hormat, kami mengundang Bapak/Ibu untuk hadir dalam rapat komite.',
  },
};

export function makeTempDir(prefix: string): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), `${prefix}-`)));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function isPdf(bytes: Uint8Array): boolean {
  return Buffer.from(bytes.subarray(0, 5)).toString('latin1') === '%PDF-';
}

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import { paths } from '../../../config/paths';
import { MAX_PDF_SIZE } from '../../../utils/filename';
import {
  InvalidFilenameError,
  PayloadTooLargeError,
  RenderFailureError,
  TemplateMissingError,
  UnknownTemplateError,
} from '../errors';
import { fromSuratTugas } from '../mappers';
import { createRenderConfig } from '../renderConfig';
import { LetterRenderer, SUPPORTED_TEMPLATES } from '../renderer';
import { isPdf, letterRequest, makeTempDir, removeDir, suratTugasRequest } from './fixtures/letters';

const staticDir = paths.letters.staticPath;
const logoPath = fs.realpathSync(path.join(staticDir, 'logo.png'));

describe('LetterRenderer', () => {
  let outputDir: string;
  let renderer: LetterRenderer;

  beforeEach(() => {
    outputDir = makeTempDir('renderer-output');
    renderer = new LetterRenderer({
      templatesDir: paths.letters.templatePath,
      staticDir,
      outputDir,
      renderConfig: createRenderConfig(),
    });
  });

  afterEach(() => {
    removeDir(outputDir);
    vi.restoreAllMocks();
  });

  it('exposes the fixed template allow-list', () => {
    expect(renderer.supportedTemplates).toEqual([...SUPPORTED_TEMPLATES]);
    expect(renderer.isSupported('surat_tugas')).toBe(true);
    expect(renderer.isSupported('surat_cinta')).toBe(false);
  });

  describe('render', () => {
    it.each([...SUPPORTED_TEMPLATES])('renders %s to PDF bytes', async (templateId) => {
      const request = templateId === 'surat_tugas' ? fromSuratTugas(suratTugasRequest) : letterRequest;
      const content = {
        ...request.content,
        students: [{ nama: 'Ahmad Fauzi' }],
        nama_perusahaan: 'PT Maju Jaya',
      };

      const pdf = await renderer.render(templateId, { ...request, content }, { logoPath: 'logo.png' });

      expect(isPdf(pdf)).toBe(true);
    });

    it('rejects a template outside the allow-list', async () => {
      await expect(renderer.render('surat_cinta', {})).rejects.toBeInstanceOf(UnknownTemplateError);
    });

    it('reports an allow-listed template whose file is missing', async () => {
      const emptyTemplates = makeTempDir('renderer-templates');
      const bare = new LetterRenderer({
        templatesDir: emptyTemplates,
        staticDir,
        outputDir,
        renderConfig: createRenderConfig(),
      });

      try {
        await expect(bare.render('surat_dinas', {})).rejects.toBeInstanceOf(TemplateMissingError);
      } finally {
        removeDir(emptyTemplates);
      }
    });

    it('wraps template failures as render failures', async () => {
      const brokenTemplates = makeTempDir('renderer-broken');
      fs.writeFileSync(path.join(brokenTemplates, 'surat_dinas.pug'), 'p= penerima.nama.toUpperCase()\n');
      const broken = new LetterRenderer({
        templatesDir: brokenTemplates,
        staticDir,
        outputDir,
        renderConfig: createRenderConfig(),
      });

      try {
        await expect(broken.render('surat_dinas', {})).rejects.toBeInstanceOf(RenderFailureError);
      } finally {
        removeDir(brokenTemplates);
      }
    });

    it('renders without a logo when the logo lies outside the static directory', async () => {
      const buildContext = vi.spyOn(renderer, 'buildContext');

      const pdf = await renderer.render('surat_dinas', { ...letterRequest }, { logoPath: '../package.json' });

      expect(isPdf(pdf)).toBe(true);
      expect(buildContext).toHaveBeenCalledWith(expect.objectContaining({ template_type: 'surat_dinas' }), undefined);
      expect(buildContext.mock.results[0].value).not.toHaveProperty('logo_path');
    });
  });

  describe('buildContext', () => {
    it('lifts content keys to the top level, content winning', () => {
      const context = renderer.buildContext({
        perihal: 'outer',
        content: { perihal: 'inner', isi: 'body' },
      });

      expect(context).toEqual({
        perihal: 'inner',
        isi: 'body',
        content: { perihal: 'inner', isi: 'body' },
      });
    });

    it('drops a caller-supplied logo_path', () => {
      const context = renderer.buildContext({ logo_path: '/etc/passwd', content: { logo_path: '/etc/shadow' } });

      expect(context).not.toHaveProperty('logo_path');
    });

    it('sets only the verified logo', () => {
      const context = renderer.buildContext({ logo_path: '/etc/passwd' }, logoPath);

      expect(context.logo_path).toBe(logoPath);
    });

    it('does not modify its input', () => {
      const data = { content: { isi: 'body' } };
      renderer.buildContext(data, logoPath);

      expect(data).toEqual({ content: { isi: 'body' } });
    });
  });

  describe('resolveLogo', () => {
    it('resolves a name relative to the static directory', () => {
      expect(renderer.resolveLogo('logo.png')).toBe(logoPath);
    });

    it('accepts an absolute path inside the static directory', () => {
      expect(renderer.resolveLogo(logoPath)).toBe(logoPath);
    });

    it.each(['../package.json', '/etc/passwd', 'missing.png', '.'])('rejects %j', (reference) => {
      expect(renderer.resolveLogo(reference)).toBeUndefined();
    });
  });

  describe('save', () => {
    it('writes the bytes under the sanitized name and returns the full path', async () => {
      const filePath = await renderer.save(Buffer.from('%PDF-1.3 test'), 'surat uji');

      expect(filePath).toBe(path.join(outputDir, 'surat uji.pdf'));
      expect(fs.readFileSync(filePath, 'latin1')).toBe('%PDF-1.3 test');
    });

    it('creates a missing output directory', async () => {
      const nested = new LetterRenderer({
        templatesDir: paths.letters.templatePath,
        staticDir,
        outputDir: path.join(outputDir, 'nested', 'dir'),
        renderConfig: createRenderConfig(),
      });

      const filePath = await nested.save(Buffer.from('%PDF-'), 'a.pdf');

      expect(fs.existsSync(filePath)).toBe(true);
    });

    it('checks the size before the filename', async () => {
      const oversized = new Uint8Array(MAX_PDF_SIZE + 1);

      await expect(renderer.save(oversized, '../../etc/passwd')).rejects.toBeInstanceOf(PayloadTooLargeError);
    });

    it('rejects an unsafe filename without writing anything', async () => {
      await expect(renderer.save(Buffer.from('%PDF-'), '../escape')).rejects.toBeInstanceOf(InvalidFilenameError);
      expect(fs.readdirSync(outputDir)).toEqual([]);
    });
  });

  describe('generate', () => {
    it('renders, saves under the given name and reports the byte size', async () => {
      const letter = await renderer.generate(letterRequest, { filename: 'undangan_komite.pdf' });

      expect(letter.filename).toBe('undangan_komite.pdf');
      expect(letter.filePath).toBe(path.join(outputDir, 'undangan_komite.pdf'));
      expect(letter.fileSize).toBe(fs.statSync(letter.filePath).size);
      expect(isPdf(fs.readFileSync(letter.filePath))).toBe(true);
    });

    it('falls back to the template type and a random suffix', async () => {
      const letter = await renderer.generate(letterRequest);

      expect(letter.filename).toMatch(/^surat_dinas_[0-9a-f]{8}\.pdf$/);
    });

    it('still renders when the school logo reference escapes the static directory', async () => {
      const letter = await renderer.generate(
        { ...letterRequest, school_info: { ...letterRequest.school_info, logo_url: '../../etc/passwd' } },
        { filename: 'tanpa_logo' }
      );

      expect(letter.filename).toBe('tanpa_logo.pdf');
      expect(letter.fileSize).toBeGreaterThan(0);
    });
  });
});

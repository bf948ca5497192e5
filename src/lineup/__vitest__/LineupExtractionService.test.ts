import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { tmpdir } from 'os';
import { LineupExtractionService, NO_ARTISTS_MESSAGE } from '../LineupExtractionService.js';
import { ArtistReconciler } from '../ArtistReconciler.js';
import { LINEUP_EXTRACTION_PROMPT } from '../prompts.js';
import { UploadStore } from '../../storage/UploadStore.js';
import type { VisionModelProvider } from '../../image-processor/types.js';
import type { ArtistRepository } from '../../storage/ArtistRepository.js';
import type { ExtractionRequest } from '../types.js';

function createVisionProvider(text: string) {
  const extractFromImage = vi.fn(async () => ({
    extracted_text: text,
    model: 'test-model',
    provider: 'test',
    processing_time_ms: 5
  }));
  const provider: VisionModelProvider = {
    name: 'test-vision',
    extractFromImage,
    getModelInfo: () => ({ name: 'test-model', provider: 'test' })
  };
  return { provider, extractFromImage };
}

describe('LineupExtractionService', () => {
  let uploadsDir: string;
  let uploadStore: UploadStore;
  const image = Buffer.from('fake-jpeg-bytes');

  const request: ExtractionRequest = {
    image,
    extension: 'jpg',
    mimeType: 'image/jpeg',
    festivalName: 'Coachella',
    year: '2025'
  };

  beforeEach(async () => {
    uploadsDir = await fs.mkdtemp(path.join(tmpdir(), 'lineup-service-'));
    uploadStore = new UploadStore(uploadsDir, () => new Date(2025, 3, 12, 18, 30, 5));
  });

  afterEach(async () => {
    await fs.rm(uploadsDir, { recursive: true, force: true });
  });

  it('should extract, reconcile, store and summarize a lineup', async () => {
    const { provider, extractFromImage } = createVisionProvider('Skrillex\nFour Tet\nFour Tet');
    const repository: ArtistRepository = {
      findByNames: async () => [{ name: 'Skrillex', slug: 'skrillex', imageUrl: 'skrillex.jpg' }]
    };
    const service = new LineupExtractionService({
      visionProvider: provider,
      reconciler: new ArtistReconciler(repository),
      uploadStore
    });

    const result = await service.extract(request);

    expect(extractFromImage).toHaveBeenCalledWith(image, 'image/jpeg', LINEUP_EXTRACTION_PROMPT);
    expect(result).toEqual({
      ok: true,
      value: {
        success: true,
        festival_name: 'Coachella',
        year: '2025',
        existing_artists: [{ name: 'Skrillex', slug: 'skrillex', imageUrl: 'skrillex.jpg' }],
        new_artists: ['Four Tet', 'Four Tet'],
        total_artists: 3,
        csv_filename: 'Coachella_2025_20250412_183005.csv',
        csv_download: '/uploads/Coachella_2025_20250412_183005.csv'
      }
    });

    const csv = await fs.readFile(path.join(uploadsDir, 'Coachella_2025_20250412_183005.csv'), 'utf-8');
    expect(csv).toBe(
      'festival_name,edition,artist_name\r\n' +
      'Coachella,2025,Skrillex\r\n' +
      'Coachella,2025,Four Tet\r\n' +
      'Coachella,2025,Four Tet\r\n'
    );
    const storedImage = await fs.readFile(path.join(uploadsDir, 'Coachella_2025_20250412_183005.jpg'));
    expect(storedImage.equals(image)).toBe(true);
  });

  it('should report a validation error when the reply has no names', async () => {
    const { provider } = createVisionProvider('\n   \n\t\n');
    const service = new LineupExtractionService({
      visionProvider: provider,
      reconciler: new ArtistReconciler(null),
      uploadStore
    });

    const result = await service.extract(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('validation');
      expect(result.error.message).toBe(NO_ARTISTS_MESSAGE);
    }
    expect(await fs.readdir(uploadsDir)).toEqual([]);
  });

  it('should report an extraction error when the vision call fails', async () => {
    const provider: VisionModelProvider = {
      name: 'failing-vision',
      extractFromImage: vi.fn().mockRejectedValue(new Error('API error: 529 - overloaded')),
      getModelInfo: () => ({ name: 'test-model', provider: 'test' })
    };
    const service = new LineupExtractionService({
      visionProvider: provider,
      reconciler: new ArtistReconciler(null),
      uploadStore
    });

    const result = await service.extract(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('extraction');
      expect(result.error.message).toBe('Failed to process image: API error: 529 - overloaded');
    }
    expect(await fs.readdir(uploadsDir)).toEqual([]);
  });

  it('should report an extraction error when results cannot be stored', async () => {
    const { provider } = createVisionProvider('Skrillex');
    const brokenStore = new UploadStore(path.join(uploadsDir, 'missing', 'dir'));
    const service = new LineupExtractionService({
      visionProvider: provider,
      reconciler: new ArtistReconciler(null),
      uploadStore: brokenStore
    });

    const result = await service.extract(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('extraction');
      expect(result.error.message.startsWith('Failed to process image: ')).toBe(true);
    }
  });

  it('should return the parsed names without storing anything', async () => {
    const { provider } = createVisionProvider('Bicep\n\nJamie xx\n');
    const service = new LineupExtractionService({
      visionProvider: provider,
      reconciler: new ArtistReconciler(null),
      uploadStore
    });

    expect(await service.extractArtistNames(image, 'image/png')).toEqual({ ok: true, value: ['Bicep', 'Jamie xx'] });
    expect(await fs.readdir(uploadsDir)).toEqual([]);
  });
});

/** @jest-environment node */
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { applyPrefix } from '../src/main/safeRenamer';
import { scanPdfFiles } from '../src/main/scanner';
import { buildSizeIndex, toCatalog } from '../src/main/sizeIndex';
import { diffCatalogs } from '../src/main/snapshotDiffer';
import { loadCatalog, saveCatalog } from '../src/main/snapshotStore';

describe('catalog workflow', () => {
  const makeTempDir = async () => fs.mkdtemp(path.join(os.tmpdir(), 'catalog-workflow-'));

  const cleanupTempDir = async (dirPath: string | null) => {
    if (dirPath) {
      await fs.rm(dirPath, { recursive: true, force: true });
    }
  };

  const scanCatalog = async (root: string) => toCatalog(buildSizeIndex(await scanPdfFiles(root)), true);

  it('merges a prefixed and a bare copy of the same file into one entry', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      await fs.mkdir(path.join(workspace, 'folder1'));
      await fs.mkdir(path.join(workspace, 'folder2'));
      await fs.writeFile(path.join(workspace, 'folder1', 'A B report.pdf'), 'a'.repeat(100));
      await fs.writeFile(path.join(workspace, 'folder2', 'report.pdf'), 'b'.repeat(100));

      const catalog = await scanCatalog(workspace);

      expect(catalog).toHaveLength(1);
      expect(catalog[0].sizeBytes).toBe(100);
      expect(catalog[0].files).toHaveLength(1);
      expect(catalog[0].files[0].filename).toBe('report.pdf');
      expect(catalog[0].files[0].classificationCodes).toEqual(['AB']);
      expect(catalog[0].files[0].locations.map((location) => location.folder)).toEqual(['folder1', 'folder2']);
    } finally {
      await cleanupTempDir(workspace);
    }
  });

  it('sees a new prefix as a classification change on the next scan', async () => {
    let workspace: string | null = null;
    try {
      workspace = await makeTempDir();
      const library = path.join(workspace, 'library');
      const catalogFile = path.join(workspace, 'catalog.json');
      await fs.mkdir(path.join(library, 'folder1'), { recursive: true });
      await fs.mkdir(path.join(library, 'folder2'), { recursive: true });
      await fs.writeFile(path.join(library, 'folder1', 'report.pdf'), 'a'.repeat(100));
      await fs.writeFile(path.join(library, 'folder2', 'report.pdf'), 'b'.repeat(100));

      await saveCatalog(await scanCatalog(library), catalogFile, { makeBackup: true });
      await applyPrefix(path.join(library, 'folder1'), 'report.pdf', 'A B');

      const previous = await loadCatalog(catalogFile);
      const diff = diffCatalogs(previous, await scanCatalog(library));

      expect(diff.hasChanges).toBe(true);
      expect(diff.changes.map((change) => change.message)).toContain(
        "CLASSIFICATION_CHANGED: report.pdf - '' -> 'AB'",
      );
      expect(diff.changes.some((change) => change.kind === 'NEW' || change.kind === 'REMOVED')).toBe(false);
    } finally {
      await cleanupTempDir(workspace);
    }
  });
});

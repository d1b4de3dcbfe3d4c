import { describe, it, expect, vi } from 'vitest';
import { detectWorkspaceRoot } from '../src/workspace/detect.js';
import { resolveWorkspace, getOutputsPath, getArchivePath } from '../src/workspace/paths.js';
import * as fs from 'node:fs';
import * as path from 'node:path';

// Mocking fs to avoid actual disk I/O in simple unit tests
vi.mock('node:fs');

describe('Workspace Detection', () => {
    it('should detect workspace root when config/rules.yaml exists', () => {
        const mockCwd = '/Users/test/finances';
        vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);

        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join(mockCwd, 'config', 'rules.yaml');
        });

        expect(detectWorkspaceRoot()).toBe(mockCwd);
    });

    it('should find the root from a nested directory', () => {
        vi.spyOn(fs, 'existsSync').mockImplementation((p: fs.PathLike) => {
            return p.toString() === path.join('/work', 'config', 'rules.yaml');
        });

        expect(detectWorkspaceRoot('/work/imports/old')).toBe('/work');
    });

    it('should return null if no workspace is found in parents', () => {
        vi.spyOn(process, 'cwd').mockReturnValue('/');
        vi.spyOn(fs, 'existsSync').mockReturnValue(false);

        expect(detectWorkspaceRoot()).toBeNull();
    });
});

describe('Path Resolution', () => {
    const root = '/work';
    const workspace = resolveWorkspace(root);

    it('should resolve standard paths correctly', () => {
        expect(workspace.root).toBe(root);
        expect(workspace.imports).toBe(path.join(root, 'imports'));
        expect(workspace.outputs).toBe(path.join(root, 'outputs'));
        expect(workspace.archive).toBe(path.join(root, 'archive'));
        expect(workspace.config.rulesPath).toBe(path.join(root, 'config', 'rules.yaml'));
        expect(workspace.config.documentsPath).toBe(path.join(root, 'data', 'documents.json'));
    });

    it('should generate per-run paths', () => {
        expect(getOutputsPath(workspace, '2024-01-31')).toBe(path.join(root, 'outputs/2024-01-31'));
        expect(getArchivePath(workspace, '2024-01-31')).toBe(path.join(root, 'archive/2024-01-31'));
    });
});

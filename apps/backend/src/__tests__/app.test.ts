/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { tmpdir } from 'os';
import type { ITodo } from '@tasklane/types';
import { buildApplication } from '../app.js';
import { LocalFileStore } from '../modules/files/index.js';
import { InMemoryTodoRepository } from '../tests/vitest/mocks/todo-repository.js';
import { startTestServer, type ITestServer } from '../tests/vitest/helpers/http.js';

const FIXED_NS = 1729339200123456789n;
const STORED_NAME = `${FIXED_NS}-report.txt`;

function jsonRequest(method: string, body: unknown): RequestInit {
    return {
        method,
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body)
    };
}

function uploadForm(field: string, content: string, filename: string): FormData {
    const form = new FormData();
    form.append(field, new Blob([content]), filename);
    return form;
}

describe('HTTP API', () => {
    let repository: InMemoryTodoRepository;
    let uploadDir: string;
    let server: ITestServer;

    beforeEach(async () => {
        repository = new InMemoryTodoRepository();
        uploadDir = await fs.mkdtemp(path.join(tmpdir(), 'uploads-'));
        const { app } = await buildApplication({
            repository,
            fileStore: new LocalFileStore(uploadDir, () => FIXED_NS),
            databaseState: () => 'connected'
        });
        server = await startTestServer(app);
    });

    afterEach(async () => {
        await server.close();
        await fs.rm(uploadDir, { recursive: true, force: true });
    });

    async function createTodo(body: unknown): Promise<ITodo> {
        const response = await fetch(`${server.baseUrl}/todos`, jsonRequest('POST', body));
        expect(response.status).toBe(201);
        return (await response.json()) as ITodo;
    }

    describe('/health', () => {
        it('should report the database state', async () => {
            const response = await fetch(`${server.baseUrl}/health`);

            expect(response.status).toBe(200);
            await expect(response.json()).resolves.toMatchObject({ status: 'ok', database: 'connected' });
        });
    });

    describe('/todos', () => {
        it('should create, fetch, complete and delete a todo', async () => {
            const created = await createTodo({ title: 'Buy milk', description: '2 litres' });
            expect(created).toMatchObject({ id: '1', title: 'Buy milk', description: '2 litres', completed: false });

            const fetched = await fetch(`${server.baseUrl}/todos/${created.uuid}`);
            expect(fetched.status).toBe(200);
            await expect(fetched.json()).resolves.toEqual(created);

            const updated = await fetch(
                `${server.baseUrl}/todos/${created.uuid}`,
                jsonRequest('PUT', { title: 'Ignored', completed: true })
            );
            expect(updated.status).toBe(200);
            await expect(updated.json()).resolves.toMatchObject({ uuid: created.uuid, title: 'Buy milk', completed: true });

            const deleted = await fetch(`${server.baseUrl}/todos/${created.uuid}`, { method: 'DELETE' });
            expect(deleted.status).toBe(204);
            await expect(deleted.text()).resolves.toBe('');

            const gone = await fetch(`${server.baseUrl}/todos/${created.uuid}`);
            expect(gone.status).toBe(404);
            await expect(gone.json()).resolves.toEqual({ success: false, error: 'Todo not found' });
        });

        it('should apply zero values for an empty object', async () => {
            const created = await createTodo({});

            expect(created).toMatchObject({ title: '', description: '', completed: false });
            expect(created).not.toHaveProperty('file_path');
        });

        it('should list every todo', async () => {
            await createTodo({ title: 'a' });
            await createTodo({ title: 'b' });

            const response = await fetch(`${server.baseUrl}/todos`);
            const todos = (await response.json()) as ITodo[];

            expect(response.status).toBe(200);
            expect(todos.map(todo => todo.title)).toEqual(['a', 'b']);
        });

        it('should return an empty array when there are no todos', async () => {
            const response = await fetch(`${server.baseUrl}/todos`);

            await expect(response.json()).resolves.toEqual([]);
        });

        it('should answer 204 when deleting an unknown uuid', async () => {
            const response = await fetch(`${server.baseUrl}/todos/unknown`, { method: 'DELETE' });

            expect(response.status).toBe(204);
        });

        it('should return the zero-valued todo when updating an unknown uuid', async () => {
            const response = await fetch(`${server.baseUrl}/todos/unknown`, jsonRequest('PUT', { completed: true }));

            expect(response.status).toBe(200);
            await expect(response.json()).resolves.toEqual({
                id: '',
                uuid: '',
                title: '',
                description: '',
                completed: false,
                created_at: '0001-01-01T00:00:00Z',
                updated_at: '0001-01-01T00:00:00Z'
            });
            await expect(repository.findAll()).resolves.toEqual([]);
        });

        it('should reject a create without a body', async () => {
            const response = await fetch(`${server.baseUrl}/todos`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: ''
            });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toEqual({ success: false, error: 'Request body is empty' });
            await expect(repository.findAll()).resolves.toEqual([]);
        });

        it('should reject a non-JSON body whatever its content type', async () => {
            const response = await fetch(`${server.baseUrl}/todos`, {
                method: 'POST',
                headers: { 'Content-Type': 'text/plain' },
                body: 'not json at all'
            });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toMatchObject({ success: false });
            await expect(repository.findAll()).resolves.toEqual([]);
        });

        it('should parse a JSON body sent without a JSON content type', async () => {
            const response = await fetch(`${server.baseUrl}/todos`, {
                method: 'POST',
                headers: { 'Content-Type': 'text/plain' },
                body: JSON.stringify({ title: 'Plain', description: 'sent as text' })
            });

            expect(response.status).toBe(201);
            await expect(response.json()).resolves.toMatchObject({ title: 'Plain', description: 'sent as text' });
        });

        it('should leave a todo untouched when an update has no body', async () => {
            const created = await createTodo({ title: 'Done already', completed: true });

            const response = await fetch(`${server.baseUrl}/todos/${created.uuid}`, { method: 'PUT' });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toEqual({ success: false, error: 'Request body is empty' });

            const after = await fetch(`${server.baseUrl}/todos/${created.uuid}`);
            await expect(after.json()).resolves.toMatchObject({ uuid: created.uuid, completed: true });
        });

        it('should reject malformed JSON with 400', async () => {
            const response = await fetch(`${server.baseUrl}/todos`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: '{"title":'
            });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toMatchObject({ success: false });
            await expect(repository.findAll()).resolves.toEqual([]);
        });

        it('should reject wrongly typed fields with 400', async () => {
            const response = await fetch(`${server.baseUrl}/todos`, jsonRequest('POST', { completed: 'yes' }));

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toEqual({
                success: false,
                error: 'completed: Expected boolean, received string'
            });
        });

        it('should surface storage failures as 500 with the raw message', async () => {
            vi.spyOn(repository, 'findAll').mockRejectedValueOnce(new Error('connection reset'));

            const response = await fetch(`${server.baseUrl}/todos`);

            expect(response.status).toBe(500);
            await expect(response.json()).resolves.toEqual({ success: false, error: 'connection reset' });
        });
    });

    describe('/files', () => {
        it('should upload, list, download and delete a file', async () => {
            const uploaded = await fetch(`${server.baseUrl}/files/upload`, {
                method: 'POST',
                body: uploadForm('file', 'hello tasklane', 'report.txt')
            });
            expect(uploaded.status).toBe(201);
            await expect(uploaded.json()).resolves.toEqual({ file_path: path.join(uploadDir, STORED_NAME) });

            const listed = await fetch(`${server.baseUrl}/files/list`);
            await expect(listed.json()).resolves.toEqual([STORED_NAME]);

            const downloaded = await fetch(`${server.baseUrl}/files/download/${STORED_NAME}`);
            expect(downloaded.status).toBe(200);
            expect(downloaded.headers.get('content-type')).toBe('application/octet-stream');
            expect(downloaded.headers.get('content-disposition')).toBe(`attachment; filename="${STORED_NAME}"`);
            await expect(downloaded.text()).resolves.toBe('hello tasklane');

            const deleted = await fetch(`${server.baseUrl}/files/${STORED_NAME}`, { method: 'DELETE' });
            expect(deleted.status).toBe(200);
            await expect(deleted.text()).resolves.toBe('');

            const relisted = await fetch(`${server.baseUrl}/files/list`);
            await expect(relisted.json()).resolves.toEqual([]);
        });

        it('should store only the basename of the client filename', async () => {
            const uploaded = await fetch(`${server.baseUrl}/files/upload`, {
                method: 'POST',
                body: uploadForm('file', 'x', 'nested/report.txt')
            });

            expect(uploaded.status).toBe(201);
            await expect(fs.readdir(uploadDir)).resolves.toEqual([STORED_NAME]);
        });

        it('should keep UTF-8 filenames as sent', async () => {
            const storedName = `${FIXED_NS}-résumé.txt`;

            const uploaded = await fetch(`${server.baseUrl}/files/upload`, {
                method: 'POST',
                body: uploadForm('file', 'cv', 'résumé.txt')
            });

            expect(uploaded.status).toBe(201);
            await expect(uploaded.json()).resolves.toEqual({ file_path: path.join(uploadDir, storedName) });

            const listed = await fetch(`${server.baseUrl}/files/list`);
            await expect(listed.json()).resolves.toEqual([storedName]);
        });

        it('should reject an upload without a file part', async () => {
            const form = new FormData();
            form.append('note', 'no attachment');

            const response = await fetch(`${server.baseUrl}/files/upload`, { method: 'POST', body: form });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toEqual({ success: false, error: 'No file provided' });
        });

        it('should reject a file sent under another field name', async () => {
            const response = await fetch(`${server.baseUrl}/files/upload`, {
                method: 'POST',
                body: uploadForm('document', 'x', 'report.txt')
            });

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toEqual({
                success: false,
                error: expect.stringMatching(/^Unexpected (file )?field/)
            });
        });

        it('should answer 404 when downloading a missing file', async () => {
            const response = await fetch(`${server.baseUrl}/files/download/missing.txt`);

            expect(response.status).toBe(404);
            await expect(response.json()).resolves.toEqual({ success: false, error: 'File not found' });
        });

        it('should reject names that escape the upload directory', async () => {
            const response = await fetch(`${server.baseUrl}/files/download/..%2F..%2Fetc%2Fpasswd`);

            expect(response.status).toBe(400);
            await expect(response.json()).resolves.toEqual({
                success: false,
                error: 'Invalid filename: ../../etc/passwd'
            });
        });

        it('should answer 500 when deleting a missing file', async () => {
            const response = await fetch(`${server.baseUrl}/files/missing.txt`, { method: 'DELETE' });
            const body = (await response.json()) as { success: boolean; error: string };

            expect(response.status).toBe(500);
            expect(body.success).toBe(false);
            expect(body.error).toMatch(/^ENOENT: no such file or directory/);
        });
    });

    describe('CORS', () => {
        it('should answer preflight requests for any origin', async () => {
            const response = await fetch(`${server.baseUrl}/todos`, { method: 'OPTIONS' });

            expect(response.status).toBe(204);
            expect(response.headers.get('access-control-allow-origin')).toBe('*');
            expect(response.headers.get('access-control-allow-methods')).toBe('GET,POST,PUT,DELETE');
            expect(response.headers.get('access-control-allow-headers')).toBe('Content-Type');
        });

        it('should allow cross-origin reads of simple responses', async () => {
            const response = await fetch(`${server.baseUrl}/todos`);

            expect(response.headers.get('access-control-allow-origin')).toBe('*');
            expect(response.headers.get('cross-origin-resource-policy')).toBe('cross-origin');
        });
    });
});

import { access, readFile } from 'node:fs/promises'

export interface FileSystem {
    readText(path: string): Promise<string>
    readJSON<T>(path: string): Promise<T>
    exists(path: string): Promise<boolean>
}

export class NodeFileSystem implements FileSystem {
    async readText(path: string): Promise<string> {
        return readFile(path, 'utf8')
    }

    async readJSON<T>(path: string): Promise<T> {
        return JSON.parse(await this.readText(path)) as T
    }

    async exists(path: string): Promise<boolean> {
        try {
            await access(path)
            return true
        } catch {
            return false
        }
    }
}

export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()

    async readText(path: string): Promise<string> {
        const content = this.files.get(path)
        if (content === undefined) throw new Error(`ENOENT: ${path}`)
        return content
    }

    async readJSON<T>(path: string): Promise<T> {
        return JSON.parse(await this.readText(path)) as T
    }

    async exists(path: string): Promise<boolean> {
        return this.files.has(path)
    }

    setFile(path: string, content: string): void {
        this.files.set(path, content)
    }
}

// src/io/SramFile.ts
//
// Leitura/gravação do arquivo .srm. A gravação nunca sobrescreve o arquivo
// anterior parcialmente: escreve num temporário no mesmo diretório, faz fsync
// e só então renomeia por cima do destino.

import * as nodeFs from 'node:fs';
import { randomBytes } from 'node:crypto';
import * as path from 'node:path';
import { IOError } from '../errors/SramError';
import { silentLogger } from '../log/Logger';
import type { Logger } from '../log/Logger';

/** Subconjunto de node:fs usado aqui (permite injetar falhas nos testes). */
export interface SramFileSystem {
  readFileSync(file: string | number): Uint8Array;
  openSync(file: string, flags: string, mode?: number): number;
  writeSync(fd: number, buffer: Uint8Array, offset?: number, length?: number): number;
  fsyncSync(fd: number): void;
  closeSync(fd: number): void;
  renameSync(oldPath: string, newPath: string): void;
  unlinkSync(file: string): void;
  existsSync(file: string): boolean;
}

export const nodeFileSystem: SramFileSystem = nodeFs;

/** "-" lê da entrada padrão. */
export const STDIN_PATH = '-';

export interface SramFileOptions {
  fs?: SramFileSystem;
  logger?: Logger;
}

/** Lê o arquivo inteiro. Não valida tamanho (isso é com o SaveImage). */
export function loadSram(file: string, options: SramFileOptions = {}): Uint8Array {
  const fs = options.fs ?? nodeFileSystem;
  const log = options.logger ?? silentLogger;
  const source = file === STDIN_PATH ? 0 : file;
  log.debug(`Lendo ${file === STDIN_PATH ? '<stdin>' : file}`);
  try {
    return Uint8Array.from(fs.readFileSync(source));
  } catch (err) {
    throw new IOError(`Falha ao ler "${file}": ${describe(err)}`, { cause: err });
  }
}

/**
 * Grava `bytes` em `file` de forma atômica (tmp + fsync + rename).
 * Qualquer falha remove o temporário e lança IOError; o destino fica como estava.
 */
export function saveSram(file: string, bytes: Uint8Array, options: SramFileOptions = {}): void {
  const fs = options.fs ?? nodeFileSystem;
  const log = options.logger ?? silentLogger;
  const target = path.resolve(file);
  const tmp = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  );

  log.debug(`Gravando ${bytes.length} bytes em ${target} (via ${path.basename(tmp)})`);

  let fd: number | null = null;
  try {
    fd = fs.openSync(tmp, 'wx', 0o644);
    let written = 0;
    while (written < bytes.length) {
      written += fs.writeSync(fd, bytes, written, bytes.length - written);
    }
    fs.fsyncSync(fd);
    fs.closeSync(fd);
    fd = null;
    fs.renameSync(tmp, target);
  } catch (err) {
    cleanup(fs, fd, tmp, log);
    throw new IOError(`Falha ao gravar "${file}": ${describe(err)}`, { cause: err });
  }
}

function cleanup(fs: SramFileSystem, fd: number | null, tmp: string, log: Logger): void {
  if (fd !== null) {
    try {
      fs.closeSync(fd);
    } catch (err) {
      log.debug(`close do temporário falhou: ${describe(err)}`);
    }
  }
  if (fs.existsSync(tmp)) {
    try {
      fs.unlinkSync(tmp);
    } catch (err) {
      log.warn(`Não foi possível remover o temporário ${tmp}: ${describe(err)}`);
    }
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// src/errors/SramError.ts

/** Categorias de falha expostas pelo editor. */
export type SramErrorKind =
  | 'FormatError'
  | 'LookupError'
  | 'DecodeError'
  | 'EncodeError'
  | 'IOError'
  | 'StateError';

/**
 * Base de todos os erros do editor de SRAM.
 * A CLI trata qualquer SramError como falha "esperada" (só a mensagem),
 * o resto sai com stack.
 */
export class SramError extends Error {
  readonly kind: SramErrorKind;

  constructor(kind: SramErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = kind;
  }
}

/** Tamanho ou assinatura do arquivo não batem com o layout do F-Zero. */
export class FormatError extends SramError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FormatError', message, options);
  }
}

/** Identificador de campo/registro desconhecido. */
export class LookupError extends SramError {
  constructor(message: string) {
    super('LookupError', message);
  }
}

/** Bytes armazenados inválidos para decodificação estrita. */
export class DecodeError extends SramError {
  constructor(message: string) {
    super('DecodeError', message);
  }
}

/** Valor fora da faixa (ou do tipo errado) para o campo alvo. */
export class EncodeError extends SramError {
  constructor(message: string) {
    super('EncodeError', message);
  }
}

/** Falha de leitura/escrita em disco. O erro do sistema vai em `cause`. */
export class IOError extends SramError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IOError', message, options);
  }
}

/** Operação chamada no estado errado do editor (ex.: antes do load). */
export class StateError extends SramError {
  constructor(message: string) {
    super('StateError', message);
  }
}

export function isSramError(err: unknown): err is SramError {
  return err instanceof SramError;
}

// src/cli/Cli.ts
import { loadConfig } from '../config/EditorConfig';
import type { EditorConfig } from '../config/EditorConfig';
import { SaveEditor } from '../editor/SaveEditor';
import { isSramError } from '../errors/SramError';
import { renderSave } from '../format/SaveReport';
import { nodeFileSystem } from '../io/SramFile';
import type { SramFileSystem } from '../io/SramFile';
import { createLogger } from '../log/Logger';
import type { LogSink, Logger } from '../log/Logger';
import { formatChecksum } from '../sram/Checksum';
import { LEAGUES } from '../sram/LeagueInfo';
import { listFields } from '../sram/Layout';
import { formatTime } from '../sram/RaceTime';
import type { FieldDescriptor } from '../sram/types';
import { isRaceSlot, parseDirectives } from './Directives';

export const VERSION = '0.1.0';

export const USAGE = `Uso: fzero-sram <comando> [opções]

Comandos:
  show   <arquivo> [--all]                 mostra o placar (--all inclui slots ocultos)
  get    <arquivo> <campo>...              lê campos
  set    <arquivo> <campo>=<valor>... [-o <saída>]
  verify <arquivo>                         confere assinaturas e checksums
  fix    <arquivo> [-o <saída>]            recalcula todos os checksums
  new    <arquivo> [--force]               cria um save zerado
  fields [prefixo]                         lista os campos conhecidos

Opções globais: --strict, -v/--verbose, -q/--quiet, -h/--help, --version
Arquivo "-" lê da entrada padrão.`;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  stdout(line: string): void;
  stderr(line: string): void;
  env?: NodeJS.ProcessEnv;
  fs?: SramFileSystem;
}

const defaultIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

interface ParsedArgs {
  command: string | null;
  positionals: string[];
  out: string | null;
  all: boolean;
  force: boolean;
  help: boolean;
  version: boolean;
  overrides: Partial<EditorConfig>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args: ParsedArgs = {
    command: null,
    positionals: [],
    out: null,
    all: false,
    force: false,
    help: false,
    version: false,
    overrides: {},
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    switch (a) {
      case '-h':
      case '--help': args.help = true; break;
      case '--version': args.version = true; break;
      case '--strict': args.overrides.strict = true; break;
      case '-v':
      case '--verbose': args.overrides.logLevel = 'debug'; break;
      case '-q':
      case '--quiet': args.overrides.logLevel = 'warn'; break;
      case '--all': args.all = true; break;
      case '--force': args.force = true; break;
      case '-o':
      case '--out': {
        const next = argv[i + 1];
        if (next === undefined) throw new UsageError(`${a} precisa de um caminho`);
        args.out = next;
        i++;
        break;
      }
      default:
        if (a.startsWith('-') && a !== '-') {
          throw new UsageError(`Opção desconhecida: ${a}`);
        }
        if (args.command === null) args.command = a;
        else args.positionals.push(a);
    }
  }
  return args;
}

/** Executa a CLI e devolve o exit code (0 ok, 1 falha, 2 uso incorreto). */
export function runCli(argv: readonly string[], io: CliIo = defaultIo): number {
  let log: Logger = createLogger('info', sinkFor(io));

  try {
    const args = parseArgs(argv);
    const config = loadConfig(io.env ?? process.env, args.overrides);
    log = createLogger(config.logLevel, sinkFor(io));
    log.debug(`args: ${JSON.stringify(argv)}`);

    if (args.help) {
      io.stdout(USAGE);
      return EXIT_OK;
    }
    if (args.version) {
      io.stdout(VERSION);
      return EXIT_OK;
    }
    if (args.command === null) {
      throw new UsageError('Nenhum comando informado.');
    }

    const editor = new SaveEditor({ strict: config.strict, logger: log, fs: io.fs });
    return runCommand(args, editor, io, log);
  } catch (err) {
    if (err instanceof UsageError) {
      log.error(err.message);
      io.stderr(USAGE);
      return EXIT_USAGE;
    }
    if (isSramError(err)) {
      log.error(err.message);
      return EXIT_FAILURE;
    }
    log.error(err instanceof Error ? err.stack ?? err.message : String(err));
    return EXIT_FAILURE;
  }
}

function runCommand(args: ParsedArgs, editor: SaveEditor, io: CliIo, log: Logger): number {
  const file: string | undefined = args.positionals[0];
  const rest = args.positionals.slice(1);

  switch (args.command) {
    case 'show': {
      editor.load(requireFile(file));
      io.stdout(renderSave(editor, { showHidden: args.all }));
      return EXIT_OK;
    }

    case 'get': {
      editor.load(requireFile(file));
      if (rest.length === 0) throw new UsageError('Informe ao menos um campo.');
      for (const id of rest) {
        io.stdout(`${id} = ${formatValue(editor, id)}`);
      }
      return EXIT_OK;
    }

    case 'set': {
      const source = requireFile(file);
      if (rest.length === 0) throw new UsageError('Informe ao menos uma diretiva campo=valor.');
      const target = args.out ?? saveTarget(source);
      const edits = parseDirectives(rest);
      editor.load(source);
      editor.setMany(edits);
      editor.save(target);
      log.info(`${edits.length} campo(s) alterado(s); salvo em ${editor.getSource() ?? ''}`);
      return EXIT_OK;
    }

    case 'verify': {
      editor.load(requireFile(file));
      let ok = true;
      for (const report of editor.verify()) {
        ok = ok && report.valid;
        log.info(
          `${report.record.name} League: ${formatChecksum(report.stored)} ${
            report.valid ? 'OK' : `INVÁLIDO (esperado ${formatChecksum(report.expected)})`
          }`
        );
      }
      return ok ? EXIT_OK : EXIT_FAILURE;
    }

    case 'fix': {
      const source = requireFile(file);
      const target = args.out ?? saveTarget(source);
      editor.load(source);
      for (const report of editor.recomputeChecksums({ all: true })) {
        log.info(`${report.record.name} League: ${formatChecksum(report.expected)}`);
      }
      editor.save(target);
      log.info(`Salvo em ${editor.getSource() ?? ''}`);
      return EXIT_OK;
    }

    case 'new': {
      const target = saveTarget(requireFile(file));
      if (!args.force && (io.fs ?? nodeFileSystem).existsSync(target)) {
        log.error(`"${target}" já existe (use --force para sobrescrever).`);
        return EXIT_FAILURE;
      }
      editor.loadBlank().save(target);
      log.info(`Save novo criado em ${target}`);
      return EXIT_OK;
    }

    case 'fields': {
      for (const field of listFields(file ?? '')) {
        io.stdout(`0x${field.offset.toString(16).toUpperCase().padStart(3, '0')}  ${field.id}  ${describeEncoding(field)}`);
      }
      return EXIT_OK;
    }

    default:
      throw new UsageError(`Comando desconhecido: ${args.command ?? ''}`);
  }
}

function requireFile(file: string | undefined): string {
  if (file === undefined) throw new UsageError('Informe o arquivo de save.');
  return file;
}

function saveTarget(file: string): string {
  if (file === '-') throw new UsageError('Com entrada "-" é preciso informar -o <saída>.');
  return file;
}

function formatValue(editor: SaveEditor, id: string): string {
  if (isRaceSlot(id)) {
    const time = {
      minutes: Number(editor.get(`${id}.minutes`)),
      seconds: Number(editor.get(`${id}.seconds`)),
      cents: Number(editor.get(`${id}.cents`)),
    };
    const hidden = editor.get(`${id}.display`) === true ? '' : ' (oculto)';
    return `${formatTime(time)} ${String(editor.get(`${id}.car`))} ${String(editor.get(`${id}.mode`))}${hidden}`;
  }

  const value = editor.get(id);
  if (Array.isArray(value)) {
    const names = LEAGUES.filter((_, i) => value[i] === true).map((l) => l.id);
    return names.length ? names.join(',') : 'none';
  }
  if (id.endsWith('.checksum') && typeof value === 'number') {
    return `${value} [${formatChecksum(value)}]`;
  }
  return String(value);
}

function describeEncoding(field: FieldDescriptor): string {
  const enc = field.encoding;
  switch (enc.kind) {
    case 'ascii': return `ascii "${enc.expected}"`;
    case 'uint': return `uint ${enc.endian}-endian`;
    case 'bcd': return `bcd 0..${enc.max}`;
    case 'enum': return enc.values.join('|');
    case 'flag': return 'bool';
    case 'mirroredFlags': return `flags ×${enc.count}`;
  }
}

function sinkFor(io: CliIo): LogSink {
  return {
    debug: io.stderr,
    info: io.stdout,
    warn: io.stderr,
    error: io.stderr,
  };
}

#!/usr/bin/env node
/* eslint no-console: off */

/**
 * Command-line entry point. Each command builds a fresh session from the
 * environment, runs one operation and prints plain text.
 */
import { parseArgs } from 'util';
import { CatalogError, ValidationError, describeError } from '../common/errors';
import { formatNumber } from '../common/formatNumber';
import { logError } from '../utils/catalogLogger';
import { createLogger } from '../utils/log';
import type { BareFileIndex } from './bareFiles';
import { CatalogSession } from './session';
import { summariseChanges } from './snapshotDiffer';
import { formatClassificationTree, sortClassificationEntries } from './tokHierarchy';

const logger = createLogger('cli');

const USAGE = `Usage: pdf-tok-catalog <command> [options]

Commands:
  scan                                   scan the root, compare with the stored catalog and save changes
  patterned                              list prefixed PDFs with their embedded titles
  bare [folder]                          list PDFs without a classification prefix
  prefix <row> <code> [folder]           give the file at <row> the prefix for <code>
  rename <row> <newName> [folder]        rename the file at <row>
  tok list | tree                        show the classification list
  tok add <code> <label>
  tok update <oldCode> <newCode> <label>
  tok delete <code>
  analyze                                find copies of protected files in other folders

Options:
  --root <path>   folder to scan (PDF_CATALOG_ROOT)
  -h, --help      show this help
`;

const requireArg = (args: string[], index: number, name: string) => {
  const value = args[index];
  if (value === undefined || value === '') {
    throw new ValidationError(`Missing <${name}>\n\n${USAGE}`);
  }
  return value;
};

const parseRow = (raw: string) => {
  const row = Number(raw);
  if (!Number.isInteger(row) || row < 1) {
    throw new ValidationError(`Row must be a positive whole number, got "${raw}"`);
  }
  return row;
};

const printListing = (listing: BareFileIndex) => {
  console.log(`${listing.folder} (${listing.size} files without a prefix)`);
  listing.entries.forEach((row) => {
    console.log(`${String(row.displayIndex).padStart(4)}  ${row.filename}`);
  });
};

const runTok = async (session: CatalogSession, args: string[]) => {
  const [action = 'list'] = args;
  switch (action) {
    case 'list': {
      const entries = await session.loadClassifications();
      sortClassificationEntries(entries).forEach((entry) => console.log(`${entry.code}\t${entry.label}`));
      return;
    }
    case 'tree':
      console.log(formatClassificationTree(await session.classificationTree()));
      return;
    case 'add': {
      const entries = await session.addClassification(requireArg(args, 1, 'code'), args.slice(2).join(' '));
      console.log(`Saved ${entries.length} classifications`);
      return;
    }
    case 'update': {
      const entries = await session.updateClassification(
        requireArg(args, 1, 'oldCode'),
        requireArg(args, 2, 'newCode'),
        args.slice(3).join(' '),
      );
      console.log(`Saved ${entries.length} classifications`);
      return;
    }
    case 'delete': {
      const removed = await session.deleteClassification(requireArg(args, 1, 'code'));
      console.log(`Deleted ${removed.code} (${removed.label})`);
      return;
    }
    default:
      throw new ValidationError(`Unknown tok action "${action}"\n\n${USAGE}`);
  }
};

export const run = async (argv: string[]): Promise<void> => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      root: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const [command, ...args] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return;
  }

  const session = new CatalogSession(values.root ? { rootPath: values.root } : {});

  switch (command) {
    case 'scan': {
      const result = await session.scanAndCompare();
      console.log(`PDFs found: ${formatNumber(result.totalFiles)}`);
      console.log(`Files with duplicate sizes: ${formatNumber(result.duplicateFiles)}`);
      result.diff.changes.forEach((change) => console.log(change.message));
      if (!result.diff.hasChanges) {
        console.log('No changes since the last scan');
      }
      const summary = Object.entries(summariseChanges(result.diff))
        .filter(([, count]) => count > 0)
        .map(([kind, count]) => `${kind}=${count}`);
      if (summary.length) {
        console.log(`Changes: ${summary.join(', ')}`);
      }
      if (result.saved) {
        console.log(`Saved ${result.saved.writtenPath}`);
        if (result.saved.backupPath) console.log(`Backup ${result.saved.backupPath}`);
      }
      if (result.failedFiles.length) {
        console.log(`Skipped ${result.failedFiles.length} unreadable files`);
      }
      return;
    }
    case 'patterned': {
      const result = await session.scanPatterned();
      console.log(`Prefixed PDFs: ${formatNumber(result.records.length)}`);
      console.log(result.reportPath ? `Report written to ${result.reportPath}` : 'No prefixed PDFs found');
      return;
    }
    case 'bare':
      printListing(await session.listBareFiles(args[0]));
      return;
    case 'prefix': {
      const row = parseRow(requireArg(args, 0, 'row'));
      const code = requireArg(args, 1, 'code');
      await session.listBareFiles(args[2]);
      // Classifications are optional here; without them any valid code is accepted.
      await session.loadClassifications().catch((error: unknown) => {
        logger.warn(`Classifications unavailable: ${describeError(error)}`);
      });
      const result = await session.applyPrefixToRow(row, code);
      console.log(`${result.fromName} -> ${result.toName}${result.label ? ` (${result.label})` : ''}`);
      printListing(result.listing);
      return;
    }
    case 'rename': {
      const row = parseRow(requireArg(args, 0, 'row'));
      const newName = requireArg(args, 1, 'newName');
      await session.listBareFiles(args[2]);
      const result = await session.renameRow(row, newName);
      console.log(`${result.fromName} -> ${result.toName}`);
      printListing(result.listing);
      return;
    }
    case 'tok':
      await runTok(session, args);
      return;
    case 'analyze': {
      const { analysis, reportPath } = await session.analyzeDuplicates();
      console.log(`Files that exist in protected folders: ${formatNumber(analysis.filesInProtected)}`);
      console.log(`Total deletable duplicates in other folders: ${formatNumber(analysis.deletableDuplicates)}`);
      analysis.folders.forEach(({ folder, files }) => console.log(`${String(files.length).padEnd(8)} ${folder}`));
      console.log(`Detailed report saved to: ${reportPath}`);
      return;
    }
    default:
      throw new ValidationError(`Unknown command "${command}"\n\n${USAGE}`);
  }
};

if (require.main === module) {
  run(process.argv.slice(2)).catch((error: unknown) => {
    if (!(error instanceof CatalogError)) {
      logError(error, { stage: 'unknown' });
    }
    console.error(describeError(error));
    process.exitCode = 1;
  });
}

import { describe, it, expect } from 'vitest';
import type { Command } from 'commander';
import { clientApp, combinedApp, nodeApp, walletApp, type CombinedCommand } from '../../src/apps.js';
import type { Query } from '../../src/args/query.js';
import type { Tx } from '../../src/args/tx.js';
import type { LedgerAddress } from '../../src/args/values.js';
import { buildApp, type App } from '../../src/cli/app.js';
import { EXIT_USAGE, parseCommand } from '../../src/cli/dispatch.js';
import type {
  ClientCommand,
  ClientContextCommand,
  TxCustomCommand,
  TxInitProposalCommand,
  TxTransferCommand,
  TxUpdateVpCommand,
  TxVoteProposalCommand,
} from '../../src/commands/client.js';
import type { LedgerCommand, NodeCommand } from '../../src/commands/node.js';
import type { UtilsCommand } from '../../src/commands/utils.js';
import type { WalletCommand } from '../../src/commands/wallet.js';
import { WalletAddress, WalletKeypair, WalletPublicKey } from '../../src/core/from-context.js';
import { captureIo, ED25519_KEY, exitCodeOf, testAddress } from '../helpers/io.js';

interface Row<T> {
  argv: string[];
  expected: T;
}

type Rows<T> = Record<string, Row<T>>;

function mapRows<T, U>(rows: Rows<T>, wrap: (command: T) => U, prefix?: string): Rows<U> {
  return Object.fromEntries(
    Object.entries(rows).map(([path, row]) => [
      prefix === undefined ? path : `${prefix} ${path}`,
      { argv: row.argv, expected: wrap(row.expected) },
    ]),
  );
}

/** Every selectable command path in the built tree, space separated. */
function leafPaths(cmd: Command, prefix: string[] = []): string[] {
  return cmd.commands.flatMap((child) => {
    const path = [...prefix, child.name()];
    return child.commands.length > 0 ? leafPaths(child, path) : [path.join(' ')];
  });
}

const LOCAL_LEDGER: LedgerAddress = { scheme: 'tcp', host: '127.0.0.1', port: 26657 };

const TX: Tx = {
  dryRun: false,
  force: false,
  broadcastOnly: false,
  ledgerAddress: LOCAL_LEDGER,
  initializedAccountAlias: undefined,
  feeAmount: 0n,
  feeToken: WalletAddress.parse('MRD'),
  gasLimit: 0n,
  signingKey: undefined,
  signer: undefined,
};

const QUERY: Query = { ledgerAddress: LOCAL_LEDGER };

const BOB = testAddress(7);

type InlinedTxCommand =
  | TxCustomCommand
  | TxTransferCommand
  | TxUpdateVpCommand
  | TxInitProposalCommand
  | TxVoteProposalCommand;

const txRows: Rows<InlinedTxCommand> = {
  tx: {
    argv: ['--code-path', 'tx.wasm', '--data-path', 'data.bin', '--dry-run'],
    expected: { type: 'tx-custom', args: { tx: { ...TX, dryRun: true }, codePath: 'tx.wasm', dataPath: 'data.bin' } },
  },
  transfer: {
    argv: [
      '--source', 'alice',
      '--target', 'bob',
      '--token', 'MRD',
      '--sub-prefix', 'sub',
      '--amount', '1.000001',
      '--fee-amount', '0.5',
      '--gas-limit', '2',
      '--signing-key', 'alice-key',
    ],
    expected: {
      type: 'tx-transfer',
      args: {
        tx: { ...TX, feeAmount: 500_000n, gasLimit: 2_000_000n, signingKey: WalletKeypair.parse('alice-key') },
        source: WalletAddress.parse('alice'),
        target: WalletAddress.parse('bob'),
        token: WalletAddress.parse('MRD'),
        subPrefix: 'sub',
        amount: 1_000_001n,
      },
    },
  },
  update: {
    argv: ['--code-path', 'vp.wasm', '--address', 'alice', '--ledger-address', 'tcp://10.0.0.2:26657'],
    expected: {
      type: 'tx-update-vp',
      args: {
        tx: { ...TX, ledgerAddress: { scheme: 'tcp', host: '10.0.0.2', port: 26657 } },
        vpCodePath: 'vp.wasm',
        address: WalletAddress.parse('alice'),
      },
    },
  },
  'init-proposal': {
    argv: ['--data-path', 'proposal.json', '--offline'],
    expected: { type: 'tx-init-proposal', args: { tx: TX, proposalData: 'proposal.json', offline: true } },
  },
  'vote-proposal': {
    argv: ['--vote', 'yay', '--offline', '--data-path', 'votes'],
    expected: {
      type: 'tx-vote-proposal',
      args: { tx: TX, proposalId: undefined, vote: 'yay', offline: true, proposalData: 'votes' },
    },
  },
};

const clientRows: Rows<ClientCommand> = {
  ...mapRows(txRows, (command): ClientCommand => ({ context: 'with', command })),
  ...mapRows<ClientContextCommand, ClientCommand>(
    {
      'init-account': {
        argv: ['--source', 'alice', '--public-key', ED25519_KEY, '--alias', 'new-account'],
        expected: {
          type: 'tx-init-account',
          args: {
            tx: { ...TX, initializedAccountAlias: 'new-account' },
            source: WalletAddress.parse('alice'),
            vpCodePath: undefined,
            publicKey: WalletPublicKey.parse(ED25519_KEY),
          },
        },
      },
      'init-validator': {
        argv: [
          '--source', 'alice',
          '--scheme', 'SECP256K1',
          '--commission-rate', '0.05',
          '--max-commission-rate-change', '0.01',
          '--consensus-key', 'alice-consensus',
          '--unsafe-dont-encrypt',
        ],
        expected: {
          type: 'tx-init-validator',
          args: {
            tx: TX,
            source: WalletAddress.parse('alice'),
            scheme: 'secp256k1',
            accountKey: undefined,
            consensusKey: WalletKeypair.parse('alice-consensus'),
            protocolKey: undefined,
            commissionRate: '0.05',
            maxCommissionRateChange: '0.01',
            validatorVpCodePath: undefined,
            unsafeDontEncrypt: true,
          },
        },
      },
      bond: {
        argv: ['--validator', 'validator-1', '--amount', '100'],
        expected: {
          type: 'bond',
          args: { tx: TX, validator: WalletAddress.parse('validator-1'), amount: 100_000_000n, source: undefined },
        },
      },
      unbond: {
        argv: ['--validator', 'validator-1', '--amount', '0.25', '--source', 'delegator'],
        expected: {
          type: 'unbond',
          args: {
            tx: TX,
            validator: WalletAddress.parse('validator-1'),
            amount: 250_000n,
            source: WalletAddress.parse('delegator'),
          },
        },
      },
      withdraw: {
        argv: ['--validator', 'validator-1', '--force'],
        expected: {
          type: 'withdraw',
          args: { tx: { ...TX, force: true }, validator: WalletAddress.parse('validator-1'), source: undefined },
        },
      },
      epoch: { argv: [], expected: { type: 'query-epoch', args: QUERY } },
      block: {
        argv: ['--ledger-address', 'unix:///run/ledger.sock'],
        expected: { type: 'query-block', args: { ledgerAddress: { scheme: 'unix', path: '/run/ledger.sock' } } },
      },
      balance: {
        argv: ['--owner', 'alice', '--token', 'MRD'],
        expected: {
          type: 'query-balance',
          args: {
            query: QUERY,
            owner: WalletAddress.parse('alice'),
            token: WalletAddress.parse('MRD'),
            subPrefix: undefined,
          },
        },
      },
      bonds: {
        argv: ['--validator', 'validator-1'],
        expected: {
          type: 'query-bonds',
          args: { query: QUERY, owner: undefined, validator: WalletAddress.parse('validator-1') },
        },
      },
      'voting-power': {
        argv: ['--epoch', '12'],
        expected: { type: 'query-voting-power', args: { query: QUERY, validator: undefined, epoch: 12n } },
      },
      'commission-rate': {
        argv: ['--validator', 'validator-1', '--epoch', '3'],
        expected: {
          type: 'query-commission-rate',
          args: { query: QUERY, validator: WalletAddress.parse('validator-1'), epoch: 3n },
        },
      },
      slashes: { argv: [], expected: { type: 'query-slashes', args: { query: QUERY, validator: undefined } } },
      'tx-result': {
        argv: ['--tx-hash', 'ABCDEF'],
        expected: { type: 'query-result', args: { query: QUERY, txHash: 'ABCDEF' } },
      },
      'query-bytes': {
        argv: ['--storage-key', '#token/balance/alice'],
        expected: {
          type: 'query-raw-bytes',
          args: { query: QUERY, storageKey: { segments: ['#token', 'balance', 'alice'] } },
        },
      },
      'query-proposal': {
        argv: ['--proposal-id', '4'],
        expected: { type: 'query-proposal', args: { query: QUERY, proposalId: 4n } },
      },
      'query-proposal-result': {
        argv: ['--offline', '--data-path', 'proposal-dir'],
        expected: {
          type: 'query-proposal-result',
          args: { query: QUERY, proposalId: undefined, offline: true, proposalFolder: 'proposal-dir' },
        },
      },
      'query-protocol-parameters': {
        argv: [],
        expected: { type: 'query-protocol-parameters', args: { query: QUERY } },
      },
    },
    (command) => ({ context: 'with', command }),
  ),
  ...mapRows<UtilsCommand, ClientCommand>(
    {
      'join-network': {
        argv: ['--chain-id', 'meridian-test.1', '--genesis-validator', 'validator-1', '--dont-prefetch-wasm'],
        expected: {
          type: 'join-network',
          args: {
            chainId: 'meridian-test.1',
            genesisValidator: 'validator-1',
            preGenesisPath: undefined,
            dontPrefetchWasm: true,
          },
        },
      },
      'fetch-wasms': {
        argv: ['--chain-id', 'meridian-test.1'],
        expected: { type: 'fetch-wasms', args: { chainId: 'meridian-test.1' } },
      },
      'init-network': {
        argv: [
          '--genesis-path', 'genesis.toml',
          '--wasm-checksums-path', 'checksums.json',
          '--chain-prefix', 'meridian-test',
          '--consensus-timeout-commit', '500ms',
          '--localhost',
          '--dont-archive',
        ],
        expected: {
          type: 'init-network',
          args: {
            genesisPath: 'genesis.toml',
            wasmChecksumsPath: 'checksums.json',
            chainIdPrefix: 'meridian-test',
            unsafeDontEncrypt: false,
            consensusTimeoutCommit: 500,
            localhost: true,
            allowDuplicateIp: false,
            dontArchive: true,
            archiveDir: undefined,
          },
        },
      },
      'init-genesis-validator': {
        argv: [
          '--alias', 'validator-1',
          '--net-address', '[::1]:26656',
          '--commission-rate', '0.05',
          '--max-commission-rate-change', '0.01',
        ],
        expected: {
          type: 'init-genesis-validator',
          args: {
            alias: 'validator-1',
            commissionRate: '0.05',
            maxCommissionRateChange: '0.01',
            netAddress: { host: '::1', port: 26656 },
            unsafeDontEncrypt: false,
            keyScheme: 'ed25519',
          },
        },
      },
    },
    (command) => ({ context: 'without', command }),
    'utils',
  ),
};

const ledgerRows: Rows<LedgerCommand> = {
  run: { argv: [], expected: { type: 'ledger-run' } },
  reset: { argv: [], expected: { type: 'ledger-reset' } },
};

const nodeRows: Rows<NodeCommand> = {
  ...mapRows(ledgerRows, (command): NodeCommand => command, 'ledger'),
  'config gen': { argv: [], expected: { type: 'config-gen' } },
};

const walletRows: Rows<WalletCommand> = {
  'key gen': {
    argv: ['--alias', 'alice', '--unsafe-dont-encrypt'],
    expected: { type: 'key-gen', args: { scheme: 'ed25519', alias: 'alice', unsafeDontEncrypt: true } },
  },
  'key find': {
    argv: ['--public-key', ED25519_KEY.toUpperCase()],
    expected: {
      type: 'key-find',
      args: { publicKey: ED25519_KEY, alias: undefined, value: undefined, unsafeShowSecret: false },
    },
  },
  'key list': {
    argv: ['--unsafe-show-secret'],
    expected: { type: 'key-list', args: { decrypt: false, unsafeShowSecret: true } },
  },
  'key export': { argv: ['--alias', 'alice'], expected: { type: 'key-export', args: { alias: 'alice' } } },
  'address gen': {
    argv: ['--scheme', 'secp256k1'],
    expected: { type: 'address-gen', args: { scheme: 'secp256k1', alias: undefined, unsafeDontEncrypt: false } },
  },
  'address find': {
    argv: ['--alias', 'bob'],
    expected: { type: 'address-find', args: { alias: 'bob', address: undefined } },
  },
  'address list': { argv: [], expected: { type: 'address-list' } },
  'address add': {
    argv: ['--alias', 'bob', '--address', BOB.toUpperCase()],
    expected: { type: 'address-add', args: { alias: 'bob', address: BOB } },
  },
};

const combinedRows: Rows<CombinedCommand> = {
  ...mapRows(nodeRows, (command): CombinedCommand => ({ type: 'node', command }), 'node'),
  ...mapRows(clientRows, (command): CombinedCommand => ({ type: 'client', command }), 'client'),
  ...mapRows(walletRows, (command): CombinedCommand => ({ type: 'wallet', command }), 'wallet'),
  ...mapRows(ledgerRows, (command): CombinedCommand => ({ type: 'ledger', command }), 'ledger'),
  ...mapRows(txRows, (command): CombinedCommand => command),
};

function describeApp<T>(app: App<T>, rows: Rows<T>): void {
  describe(app.name, () => {
    it('should have a row for every command in the tree', () => {
      expect(leafPaths(buildApp(app)).sort()).toEqual(Object.keys(rows).sort());
    });

    it.each(Object.entries(rows))('should round-trip %s', (path, row) => {
      const tokens = path.split(' ');
      const io = captureIo();
      const { command, token } = parseCommand(app, [...tokens, ...row.argv], io);
      expect(command).toEqual(row.expected);
      expect(token).toBe(tokens[0]);
      expect(io.stderr()).toBe('');
    });
  });
}

describe('command vocabulary', () => {
  describeApp(clientApp, clientRows);
  describeApp(nodeApp, nodeRows);
  describeApp(walletApp, walletRows);
  describeApp(combinedApp, combinedRows);

  describe('conflicting arguments', () => {
    const cases: Array<[App<unknown>, string[], string]> = [
      [
        walletApp,
        ['key', 'find', '--public-key', ED25519_KEY, '--alias', 'alice'],
        "error: option '--public-key <public-key>' cannot be used with option '--alias <alias>'\n",
      ],
      [
        walletApp,
        ['key', 'find', '--public-key', ED25519_KEY, '--value', 'alice'],
        "error: option '--public-key <public-key>' cannot be used with option '--value <value>'\n",
      ],
      [
        walletApp,
        ['key', 'find', '--alias', 'alice', '--value', 'alice'],
        "error: option '--alias <alias>' cannot be used with option '--value <value>'\n",
      ],
      [
        clientApp,
        ['query-proposal-result', '--proposal-id', '1', '--offline'],
        "error: option '--proposal-id <proposal-id>' cannot be used with option '--offline'\n",
      ],
      [
        clientApp,
        ['query-proposal-result', '--proposal-id', '1', '--data-path', 'proposal-dir'],
        "error: option '--proposal-id <proposal-id>' cannot be used with option '--data-path <data-path>'\n",
      ],
    ];

    it.each(cases)('should reject %#', (app, argv, message) => {
      const io = captureIo();
      expect(exitCodeOf(() => parseCommand(app, argv, io))).toBe(EXIT_USAGE);
      expect(io.stderr()).toBe(message);
    });
  });
});

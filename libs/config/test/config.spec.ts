import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import config, {
  DEFAULT_MARKETPLACE,
  getConfigByNetwork,
  getMarketplace,
  getNetwork,
  getSeed,
  getSettlementCycle,
  parseMarketplaceCfg,
  parseSeedCfg,
} from '../src/config';

describe('config', () => {
  const env = { ...process.env };

  afterEach(() => {
    process.env = { ...env };
    jest.restoreAllMocks();
  });

  describe('getNetwork', () => {
    it('defaults to devnet', () => {
      expect(getNetwork('')).toBe('devnet');
    });

    it('ignores case', () => {
      expect(getNetwork('TestNet')).toBe('testnet');
    });

    it('rejects unknown networks', () => {
      expect(() => getNetwork('moonnet')).toThrow('Invalid network: moonnet');
    });
  });

  describe('parseMarketplaceCfg', () => {
    it('falls back to the defaults', () => {
      expect(parseMarketplaceCfg(undefined)).toEqual(DEFAULT_MARKETPLACE);
      expect(parseMarketplaceCfg(['owner'])).toEqual(DEFAULT_MARKETPLACE);
    });

    it('keeps only well-typed fields', () => {
      expect(
        parseMarketplaceCfg({
          owner: 'alice',
          feeRate: '10',
          buyerWhitelistMaxBatchSize: 5,
          allowedCurrencies: ['native', 7],
        }),
      ).toEqual({
        ...DEFAULT_MARKETPLACE,
        owner: 'alice',
        buyerWhitelistMaxBatchSize: 5,
      });
    });
  });

  describe('getMarketplace', () => {
    it('reads the network section of marketplace.json', () => {
      expect(getMarketplace('mainnet')).toEqual({
        owner: 'mainnet-owner',
        feeRecipient: 'mainnet-fee-recipient',
        feeRate: 2000,
        buyerWhitelistMaxBatchSize: 100,
        version: '1.0.0',
        allowedCurrencies: ['native'],
      });
    });

    it('warns about a missing file', () => {
      const warn = jest
        .spyOn(Logger.prototype, 'warn')
        .mockImplementation(() => undefined);

      expect(getConfigByNetwork('missing.json', 'devnet')).toBeUndefined();
      expect(warn).toHaveBeenCalledTimes(1);
    });
  });

  describe('parseSeedCfg', () => {
    it('is empty without a seed', () => {
      expect(parseSeedCfg(undefined)).toEqual({
        balances: {},
        collections: [],
      });
    });

    it('drops malformed entries', () => {
      expect(
        parseSeedCfg({
          balances: { alice: '100', bob: 5, carol: '-1' },
          collections: [
            {
              name: 'Good',
              standard: 'ERC1155',
              mints: [
                { to: 'alice', tokenId: '1', amount: '10' },
                { to: 'alice', tokenId: 'one' },
              ],
            },
            { name: 'Unknown', standard: 'ERC20', mints: [] },
            { standard: 'ERC721' },
          ],
        }),
      ).toEqual({
        balances: { alice: '100' },
        collections: [
          {
            name: 'Good',
            standard: 'ERC1155',
            mints: [{ to: 'alice', tokenId: '1', amount: '10' }],
          },
        ],
      });
    });
  });

  describe('getSeed', () => {
    it('reads the devnet seed', () => {
      const seed = getSeed('devnet');

      expect(seed.balances).toEqual({
        seller: '1000000000000000000000',
        buyer: '1000000000000000000000',
      });
      expect(seed.collections.map((c) => [c.name, c.standard])).toEqual([
        ['Devnet Lanterns', 'ERC721'],
        ['Devnet Relics', 'ERC1155'],
      ]);
      expect(seed.collections[0].royalty).toEqual({
        receiver: 'creator',
        basisPoints: 500,
      });
    });

    it('is empty for networks without one', () => {
      expect(getSeed('mainnet')).toEqual({ balances: {}, collections: [] });
    });
  });

  describe('getSettlementCycle', () => {
    it('reads keepers and the pause from the environment', () => {
      process.env.SETTLEMENT_KEEPERS = 'keeper-a,keeper-b';
      process.env.SETTLEMENT_SLEEP = '250';

      expect(getSettlementCycle()).toEqual({
        keepers: ['keeper-a', 'keeper-b'],
        sleep: 250,
      });
    });

    it('has defaults', () => {
      delete process.env.SETTLEMENT_KEEPERS;
      delete process.env.SETTLEMENT_SLEEP;

      expect(getSettlementCycle()).toEqual({
        keepers: ['keeper'],
        sleep: 15000,
      });
    });
  });

  it('builds the configuration tree', () => {
    process.env.NETWORK = 'testnet';
    process.env.WEB_APP_PORT = '7001';

    const tree = new ConfigService(config());

    expect(tree.get('network')).toBe('testnet');
    expect(tree.get('web-api.port')).toBe(7001);
    expect(tree.get('testnet.marketplace')).toEqual(getMarketplace('testnet'));
  });
});

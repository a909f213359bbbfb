import type { Hex } from 'viem';
import { EndpointDirectory } from '../config/chains.ts';
import { MAX_REPORTS } from '../engine/share-oracle.ts';
import { ExchangeTracker } from '../messaging/exchanges.ts';
import { CrossChainMessenger } from '../messaging/messenger.ts';
import { buildReceiveOption, combineOptions } from '../messaging/options.ts';
import { addressToBytes32, type InboundPacket } from '../messaging/transport.ts';
import { ManualClock } from './_utils/clock.ts';
import { BASE_FEE, LoopbackNetwork } from './_utils/fakeTransport.ts';
import { buildOracle, LOCAL_CHAIN, REMOTE_CHAIN } from './_utils/oracleHarness.ts';
import { DELEGATE, PEER_A, PEER_B, USDC, VAULT_A, VAULT_B } from './_utils/addresses.ts';

const HOME_EID = 30101;
const AWAY_EID = 30109;
const ZERO_PEER: Hex = `0x${'0'.repeat(64)}`;

const GAS = buildReceiveOption(200_000n);

function node(network: LoopbackNetwork, clock: ManualClock, chainId: number, eid: number) {
  const h = buildOracle({ localChainId: chainId, clock });
  const exchanges = new ExchangeTracker(3600, clock.clock);
  const messenger = new CrossChainMessenger({
    transport: network.transport(eid),
    oracle: h.oracle,
    collector: h.collector,
    processed: h.stores.processed,
    endpoints: new EndpointDirectory([
      { chainId: LOCAL_CHAIN, endpointId: HOME_EID },
      { chainId: REMOTE_CHAIN, endpointId: AWAY_EID },
    ]),
    exchanges,
  });
  network.attach(eid, messenger);
  return { ...h, exchanges, messenger };
}

function setup() {
  const clock = new ManualClock();
  const network = new LoopbackNetwork();
  network.register(HOME_EID, addressToBytes32(PEER_A));
  network.register(AWAY_EID, addressToBytes32(PEER_B));

  const home = node(network, clock, LOCAL_CHAIN, HOME_EID);
  const away = node(network, clock, REMOTE_CHAIN, AWAY_EID);
  home.messenger.setPeer(AWAY_EID, addressToBytes32(PEER_B));
  away.messenger.setPeer(HOME_EID, addressToBytes32(PEER_A));

  home.vaults.set(VAULT_A, { asset: USDC, sharePrice: 1_020_000n, assetDecimals: 6 });
  away.vaults.set(VAULT_B, { asset: USDC, sharePrice: 1_050_000n, assetDecimals: 6 });
  return { clock, network, home, away };
}

describe('CrossChainMessenger', () => {
  describe('push (AB)', () => {
    test('delivers fresh reports that the receiver ingests', async () => {
      const { clock, network, home, away } = setup();

      const receipt = await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);
      const outcome = await network.deliverNext();

      const expected = {
        sharePrice: 1_050_000n,
        lastUpdate: clock.now,
        originChainId: REMOTE_CHAIN,
        rewardsDelegate: DELEGATE,
        vaultAddress: VAULT_B,
        asset: USDC,
        assetDecimals: 6,
      };
      expect(outcome).toEqual({
        type: 'AB',
        originChainId: REMOTE_CHAIN,
        ingested: { accepted: [expected], skipped: [] },
      });
      await expect(home.oracle.latestReport(REMOTE_CHAIN, VAULT_B)).resolves.toEqual(expected);
      expect(receipt.fee).toEqual({ nativeFee: BASE_FEE, tokenFee: 0n });
      expect(away.exchanges.get(receipt.guid)).toMatchObject({ kind: 'push', status: 'sent' });
    });

    test('acknowledging a delivered push settles it', async () => {
      const { away } = setup();
      const receipt = await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);

      expect(away.messenger.acknowledge(receipt.guid)).toBe(true);
      expect(away.messenger.acknowledge(receipt.guid)).toBe(false);
      expect(away.exchanges.get(receipt.guid)).toMatchObject({ status: 'delivered' });
    });

    test('quotes the fee for the merged options', async () => {
      const { home } = setup();
      home.messenger.setEnforcedOptions(AWAY_EID, 'AB', buildReceiveOption(100_000n, 300n));

      await expect(home.messenger.quoteSendReports(REMOTE_CHAIN, [VAULT_A], GAS, DELEGATE)).resolves.toEqual({
        nativeFee: BASE_FEE + 300n,
        tokenFee: 0n,
      });
    });

    test('sends enforced options ahead of the caller options', async () => {
      const { network, home } = setup();
      const enforced = buildReceiveOption(100_000n, 300n);
      home.messenger.setEnforcedOptions(AWAY_EID, 'AB', enforced);

      await home.messenger.sendReports(REMOTE_CHAIN, [VAULT_A], GAS, DELEGATE, BASE_FEE + 300n);

      expect(network.sent[0].options).toBe(combineOptions(enforced, GAS));
      expect(network.sent[0].packet.value).toBe(300n);
    });

    test('refuses to send when the value does not cover the fee', async () => {
      const { network, away } = setup();
      await expect(
        away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE - 1n),
      ).rejects.toMatchObject({ code: 'InsufficientFee', details: { nativeFee: BASE_FEE, value: BASE_FEE - 1n } });
      expect(network.sent).toEqual([]);
    });

    test('refuses destinations without a peer or an endpoint', async () => {
      const { away } = setup();
      await expect(away.messenger.sendReports(10, [VAULT_B], GAS, DELEGATE, BASE_FEE)).rejects.toMatchObject({
        code: 'UnknownEndpoint',
      });

      away.messenger.setPeer(HOME_EID, ZERO_PEER);
      expect(away.messenger.peerOf(HOME_EID)).toBeUndefined();
      await expect(
        away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE),
      ).rejects.toMatchObject({ code: 'PeerNotSet' });
    });

    test(`refuses more than ${MAX_REPORTS} vaults before reading any`, async () => {
      const { away } = setup();
      const vaults = Array.from({ length: MAX_REPORTS + 1 }, () => VAULT_B);

      await expect(away.messenger.sendReports(LOCAL_CHAIN, vaults, GAS, DELEGATE, BASE_FEE)).rejects.toMatchObject({
        code: 'ExceedsMaxReports',
      });
      expect(away.vaults.calls).toBe(0);
    });
  });

  describe('request (ABA)', () => {
    test('the response is paid by the value forwarded with the request', async () => {
      const { network, home, away } = setup();
      const request = buildReceiveOption(200_000n, 5_000n);
      const returnOptions = buildReceiveOption(150_000n);

      await expect(
        home.messenger.quoteRequestReports(REMOTE_CHAIN, [VAULT_B], request, returnOptions, DELEGATE),
      ).resolves.toEqual({ nativeFee: BASE_FEE + 5_000n, tokenFee: 0n });

      const receipt = await home.messenger.requestReports(
        REMOTE_CHAIN,
        [VAULT_B],
        request,
        returnOptions,
        DELEGATE,
        BASE_FEE + 5_000n,
      );
      expect(home.exchanges.get(receipt.guid)).toMatchObject({ kind: 'request', status: 'request-sent' });

      const answered = await network.deliverNext();
      expect(answered).toMatchObject({
        type: 'ABA',
        originChainId: LOCAL_CHAIN,
        response: { nonce: 1n, fee: { nativeFee: 5_000n, tokenFee: 0n } },
      });
      expect(network.sent[1].options).toBe(returnOptions);

      await network.deliverNext();
      await expect(home.oracle.latestReport(REMOTE_CHAIN, VAULT_B)).resolves.toMatchObject({
        sharePrice: 1_050_000n,
      });
      expect(home.exchanges.get(receipt.guid)).toMatchObject({ status: 'response-received' });
      expect(away.exchanges.list()).toMatchObject([{ kind: 'push', dstEid: HOME_EID, vaults: [VAULT_B] }]);
    });

    test('an unfunded response fails and can be redelivered', async () => {
      const { network, home, away } = setup();
      await home.messenger.requestReports(REMOTE_CHAIN, [VAULT_B], GAS, GAS, DELEGATE, BASE_FEE);
      const { packet } = network.sent[0];

      await expect(network.deliverNext()).rejects.toMatchObject({ code: 'InsufficientFee' });
      await expect(away.stores.processed.has(packet.guid)).resolves.toBe(false);
      expect(network.sent).toHaveLength(1);

      await expect(away.messenger.receive({ ...packet, value: BASE_FEE })).resolves.toMatchObject({
        type: 'ABA',
      });
      expect(network.sent).toHaveLength(2);
    });

    test('requests stop waiting after the timeout', async () => {
      const { clock, home } = setup();
      const receipt = await home.messenger.requestReports(REMOTE_CHAIN, [VAULT_B], GAS, GAS, DELEGATE, BASE_FEE);

      clock.advance(3600);
      expect(home.messenger.sweep()).toEqual([]);
      clock.advance(1);
      expect(home.messenger.sweep()).toMatchObject([{ guid: receipt.guid, status: 'timed-out' }]);
    });
  });

  describe('receive', () => {
    test('rejects a replayed delivery', async () => {
      const { network, home, away } = setup();
      await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);
      await network.deliverNext();

      await expect(home.messenger.receive(network.sent[0].packet)).rejects.toMatchObject({
        code: 'MessageAlreadyProcessed',
        category: 'replay',
      });
    });

    test('a replay with the guid in another hex case is still rejected', async () => {
      const { network, home, away } = setup();
      await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);
      await network.deliverNext();
      const { packet } = network.sent[0];
      const guid: Hex = `0x${packet.guid.slice(2).toUpperCase()}`;

      await expect(home.messenger.receive({ ...packet, guid })).rejects.toMatchObject({
        code: 'MessageAlreadyProcessed',
      });
    });

    test('rejects senders other than the configured peer', async () => {
      const { network, home, away } = setup();
      await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);
      const { packet } = network.sent[0];

      await expect(
        home.messenger.receive({ ...packet, origin: { ...packet.origin, sender: addressToBytes32(DELEGATE) } }),
      ).rejects.toMatchObject({ code: 'OnlyPeer' });
      await expect(home.stores.processed.has(packet.guid)).resolves.toBe(false);
    });

    test('matches the peer regardless of hex case', async () => {
      const { network, home, away } = setup();
      await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);
      const { packet } = network.sent[0];
      const upper: Hex = `0x${packet.origin.sender.slice(2).toUpperCase()}`;

      await expect(
        home.messenger.receive({ ...packet, origin: { ...packet.origin, sender: upper } }),
      ).resolves.toMatchObject({ type: 'AB' });
    });

    test('rejects endpoints without a peer', async () => {
      const { network, home, away } = setup();
      await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);
      const { packet } = network.sent[0];

      await expect(
        home.messenger.receive({ ...packet, origin: { ...packet.origin, srcEid: 999 } }),
      ).rejects.toMatchObject({ code: 'PeerNotSet' });
    });

    test('releases the guid when applying fails', async () => {
      const { network, home, away } = setup();
      await away.messenger.sendReports(LOCAL_CHAIN, [VAULT_B], GAS, DELEGATE, BASE_FEE);
      const { packet } = network.sent[0];
      const garbled: InboundPacket = { ...packet, message: '0x0009000000' };

      await expect(home.messenger.receive(garbled)).rejects.toMatchObject({ code: 'InvalidMessageType' });
      await expect(home.stores.processed.has(packet.guid)).resolves.toBe(false);

      await expect(home.messenger.receive(packet)).resolves.toMatchObject({ type: 'AB' });
      await expect(home.stores.processed.has(packet.guid)).resolves.toBe(true);
    });
  });

  describe('configuration', () => {
    test('peers must be 32 bytes', () => {
      const { home } = setup();
      expect(() => home.messenger.setPeer(AWAY_EID, PEER_B)).toThrow(
        expect.objectContaining({ code: 'InvalidAddress' }),
      );
    });

    test('enforced options must be type 3 and can be cleared', () => {
      const { home } = setup();
      expect(() => home.messenger.setEnforcedOptions(AWAY_EID, 'AB', '0x00010000')).toThrow(
        expect.objectContaining({ code: 'InvalidOptions' }),
      );

      const enforced = buildReceiveOption(100_000n);
      home.messenger.setEnforcedOptions(AWAY_EID, 'ABA', enforced);
      expect(home.messenger.combineOptions(AWAY_EID, 'ABA', '0x')).toBe(enforced);
      expect(home.messenger.combineOptions(AWAY_EID, 'AB', GAS)).toBe(GAS);

      home.messenger.setEnforcedOptions(AWAY_EID, 'ABA', '0x');
      expect(home.messenger.combineOptions(AWAY_EID, 'ABA', GAS)).toBe(GAS);
    });
  });
});

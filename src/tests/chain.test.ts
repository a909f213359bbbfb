import { createPublicClient, custom, decodeFunctionData, encodeFunctionResult, erc20Abi, type Hex } from 'viem';
import { aggregatorAbi, vaultAbi } from '../chain/abi.ts';
import { ViemAggregatorReader, ViemTokenReader, ViemVaultReader } from '../chain/viem.ts';
import { FEED_ETH_USD, USDC, VAULT_A } from './_utils/addresses.ts';

const abi = [...vaultAbi, ...aggregatorAbi];

// Answers eth_call in process from the ABIs the readers use
function answer(data: Hex): Hex {
  const call = decodeFunctionData({ abi, data });
  switch (call.functionName) {
    case 'asset':
      return encodeFunctionResult({ abi: vaultAbi, functionName: 'asset', result: USDC });
    case 'convertToAssets': {
      const [shares] = call.args;
      return encodeFunctionResult({ abi: vaultAbi, functionName: 'convertToAssets', result: (shares * 105n) / 100n });
    }
    case 'decimals':
      return encodeFunctionResult({ abi: erc20Abi, functionName: 'decimals', result: 6 });
    case 'latestRoundData':
      return encodeFunctionResult({
        abi: aggregatorAbi,
        functionName: 'latestRoundData',
        result: [12n, 2_000n * 10n ** 8n, 1_000n, 1_100n, 12n],
      });
  }
}

const client = createPublicClient({
  transport: custom({
    async request({ method, params }) {
      if (method !== 'eth_call') throw new Error(`unexpected ${method}`);
      return answer(params[0].data);
    },
  }),
});

describe('viem readers', () => {
  test('vault reader reads the asset and converts shares', async () => {
    const vaults = new ViemVaultReader(client);
    await expect(vaults.asset(VAULT_A)).resolves.toBe(USDC);
    await expect(vaults.convertToAssets(VAULT_A, 1_000_000n)).resolves.toBe(1_050_000n);
  });

  test('token reader returns decimals', async () => {
    await expect(new ViemTokenReader(client).decimals(USDC)).resolves.toBe(6);
  });

  test('aggregator reader names the round fields', async () => {
    const reader = new ViemAggregatorReader(client);
    await expect(reader.latestRoundData(FEED_ETH_USD)).resolves.toEqual({
      roundId: 12n,
      answer: 2_000n * 10n ** 8n,
      startedAt: 1_000n,
      updatedAt: 1_100n,
      answeredInRound: 12n,
    });
    await expect(reader.decimals(FEED_ETH_USD)).resolves.toBe(6);
  });
});

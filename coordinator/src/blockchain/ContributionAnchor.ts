import { Web3 } from 'web3';
import * as crypto from 'crypto';
import type { FinalizeResult } from '../types';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';

const ANCHOR_ABI = [
  {
    inputs: [
      { name: '_version', type: 'uint256' },
      { name: '_lineage', type: 'string' },
      { name: '_weightsRef', type: 'string' },
      { name: '_contributorCount', type: 'uint256' },
      { name: '_journalHead', type: 'bytes32' }
    ],
    name: 'recordFinalize',
    outputs: [],
    stateMutability: 'nonpayable',
    type: 'function'
  }
] as const;

export interface AnchorRecord {
  version: number;
  lineage: string;
  weightsRef: string;
  contributorCount: number;
  journalHead: string;
  transactionHash: string;
  simulated: boolean;
}

/**
 * Publishes finalize records to an external ledger so contribution history
 * can be audited without trusting the coordinator's own storage.
 */
export interface ContributionAnchor {
  anchorFinalize(result: FinalizeResult, journalHead: string): Promise<AnchorRecord>;
  records(): AnchorRecord[];
  isHealthy(): Promise<boolean>;
  dispose(): void;
}

export interface Web3AnchorOptions {
  rpcUrl?: string;
  contractAddress?: string;
  privateKey?: string;
  simulation: boolean;
}

export class Web3ContributionAnchor implements ContributionAnchor {
  private web3: Web3 | null = null;
  private fromAddress: string | null = null;
  private anchored: AnchorRecord[] = [];
  private logger: Logger;

  constructor(private readonly options: Web3AnchorOptions) {
    this.logger = new Logger('ContributionAnchor');

    if (!options.simulation) {
      this.initializeBlockchain();
    } else {
      this.logger.info('Contribution anchoring running in simulation mode');
    }
  }

  private initializeBlockchain(): void {
    const { rpcUrl, contractAddress, privateKey } = this.options;
    if (!rpcUrl || !contractAddress) {
      throw new Error('BLOCKCHAIN_RPC_URL and CONTRACT_ADDRESS are required unless BLOCKCHAIN_SIMULATION=true');
    }

    this.web3 = new Web3(rpcUrl);
    if (privateKey) {
      const account = this.web3.eth.accounts.privateKeyToAccount(privateKey);
      this.web3.eth.accounts.wallet.add(account);
      this.fromAddress = account.address;
      this.logger.info(`Added account: ${account.address}`);
    }
    this.logger.info('Blockchain anchoring initialized', { rpcUrl, contractAddress });
  }

  async anchorFinalize(result: FinalizeResult, journalHead: string): Promise<AnchorRecord> {
    const { model, credited } = result;
    const head = journalHead.startsWith('0x') ? journalHead : `0x${journalHead}`;
    const params = [model.version, model.lineage, model.weightsRef, credited.length, head] as const;

    let transactionHash: string;
    if (!this.web3) {
      transactionHash = this.simulateTransaction('recordFinalize', params);
      this.logger.info(`[SIMULATION] Finalize of version ${model.version} anchored`, { transactionHash });
    } else {
      transactionHash = await this.sendFinalize(this.web3, params);
      this.logger.info(`Finalize of version ${model.version} anchored on chain`, { transactionHash });
    }

    const record: AnchorRecord = {
      version: model.version,
      lineage: model.lineage,
      weightsRef: model.weightsRef,
      contributorCount: credited.length,
      journalHead: head,
      transactionHash,
      simulated: this.web3 === null
    };
    this.anchored.push(record);
    return record;
  }

  records(): AnchorRecord[] {
    return this.anchored.map((record) => ({ ...record }));
  }

  async isHealthy(): Promise<boolean> {
    if (!this.web3) {
      return this.options.simulation;
    }
    try {
      await this.web3.eth.getBlockNumber();
      return true;
    } catch (error) {
      this.logger.error('Blockchain health check failed:', error);
      return false;
    }
  }

  dispose(): void {
    // HTTP providers hold no connection; dropping the client is enough.
    this.web3 = null;
    this.logger.info('Contribution anchor disposed');
  }

  private async sendFinalize(
    web3: Web3,
    params: readonly [number, string, string, number, string]
  ): Promise<string> {
    const contractAddress = this.options.contractAddress;
    if (!contractAddress) {
      throw new Error('CONTRACT_ADDRESS is not configured');
    }
    const contract = new web3.eth.Contract(ANCHOR_ABI, contractAddress);
    const from = this.fromAddress ?? (await web3.eth.getAccounts())[0];
    if (!from) {
      throw new Error('No account available to send anchoring transactions');
    }

    try {
      const receipt = await contract.methods
        .recordFinalize(params[0], params[1], params[2], params[3], params[4])
        .send({ from, gas: '300000' });
      return String(receipt.transactionHash);
    } catch (error) {
      throw new Error(`Failed to anchor finalize of version ${params[0]}: ${errorMessage(error)}`);
    }
  }

  private simulateTransaction(method: string, params: readonly unknown[]): string {
    const txData = JSON.stringify({ method, params });
    return '0x' + crypto.createHash('sha256').update(txData).digest('hex');
  }
}

import { createClient } from '@supabase/supabase-js';
import OpenAI from 'openai';
import { describe, expect, it, vi } from 'vitest';
import { ClassifiedAccount, createAccountRecord } from '../../types/account_types';
import { NullKnowledgebaseClient, VectorKnowledgebaseClient, buildReferenceQuery } from '../knowledgebase';

const entry: ClassifiedAccount = {
    account: {
        ...createAccountRecord('DISCOVER', 'DISCOVER CARD', 0),
        status: 'Charge off',
        negativeItems: ['Charge off'],
        violations: ['Balance reported after charge-off: charged-off account reports a $4946 balance']
    },
    policy: 'delete'
};

function vectorClient(maxReferences: number): { client: VectorKnowledgebaseClient; openai: OpenAI } {
    const openai = new OpenAI({ apiKey: 'test-key' });
    const db = createClient('http://localhost:54321', 'test-key', {
        auth: { persistSession: false, autoRefreshToken: false }
    });
    const client = new VectorKnowledgebaseClient(openai, db, {
        matchFunction: 'match_knowledgebase_chunks',
        matchThreshold: 0.75,
        maxReferences
    });
    return { client, openai };
}

describe('buildReferenceQuery', () => {
    it('describes the account and its issues', () => {
        expect(buildReferenceQuery(entry, 2)).toBe(
            'Creditor: DISCOVER. Status: Charge off. Requested action: delete. Dispute round 2. Issues: Charge off, Balance reported after charge-off.'
        );
    });
});

describe('knowledgebase clients', () => {
    it('returns no references when not configured', async () => {
        expect(await new NullKnowledgebaseClient().findReferences()).toEqual([]);
    });

    it('skips the lookup when no references are wanted', async () => {
        const { client, openai } = vectorClient(0);
        const create = vi.spyOn(openai.embeddings, 'create');

        expect(await client.findReferences(entry, 1)).toEqual([]);
        expect(create).not.toHaveBeenCalled();
    });

    it('degrades to no references when the embedding call fails', async () => {
        const { client, openai } = vectorClient(3);
        vi.spyOn(openai.embeddings, 'create').mockRejectedValue(new Error('offline'));

        expect(await client.findReferences(entry, 1)).toEqual([]);
    });
});

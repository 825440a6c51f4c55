import { fileURLToPath } from 'node:url';

import { parseFeedSnapshot, parseInventory } from '../../lib/inventory';
import type { PipelineInput } from '../../lib/pipeline';
import feedsJson from '../fixtures/feeds.json';
import inventoryJson from '../fixtures/inventory.json';

export const INVENTORY_FIXTURE = fileURLToPath(new URL('../fixtures/inventory.json', import.meta.url));
export const FEEDS_FIXTURE = fileURLToPath(new URL('../fixtures/feeds.json', import.meta.url));

export const DEMO_PROJECT = '/projects/demo';

export function loadFixtureInput(projectPath = DEMO_PROJECT): PipelineInput {
    return {
        projectPath,
        assets: parseInventory(inventoryJson),
        records: parseFeedSnapshot(feedsJson).records,
    };
}

import { Prompt } from './Prompt';
import { Word } from './Word';

/**
 * CustomModel Domain Entity
 *
 * A named collection of word overrides and prompts scoped to one language.
 * Creating a model returns only `customization_id`; the list call omits
 * `words` and `prompts`.
 */
export interface CustomModel {
    customization_id: string;
    name?: string;
    language?: string;
    owner?: string;
    /** ISO 8601, UTC */
    created?: string;
    last_modified?: string;
    description?: string;
    words?: Word[];
    prompts?: Prompt[];
}

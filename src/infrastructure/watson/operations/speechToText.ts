import { SpeechModel } from '../../../domain/entities/SpeechModel';
import { SpeechModelId, speechModelId } from '../../../domain/services/SpeechModels';
import { decodeWith, validators } from '../schemas';
import { WatsonOperation } from '../WatsonOperation';

export function listModels(): WatsonOperation<SpeechModel[]> {
    const decode = decodeWith(validators.speechModels, 'listModels');
    return {
        name: 'listModels',
        method: 'GET',
        path: 'v1/models',
        success: [200],
        errors: [406, 415, 500, 503],
        response: { kind: 'json', decode: (data) => decode(data).models },
    };
}

export function getModel(model: SpeechModelId): WatsonOperation<SpeechModel> {
    const id = speechModelId(model);
    return {
        name: 'getModel',
        method: 'GET',
        path: 'v1/models/{model_id}',
        pathParams: { model_id: id },
        success: [200],
        errors: [404, 406, 415, 500, 503],
        resource: { id, on: [404] },
        response: { kind: 'json', decode: decodeWith(validators.speechModel, 'getModel') },
    };
}

import { CustomModel } from './CustomModel';

export interface SupportedFeatures {
    custom_pronunciation: boolean;
    voice_transformation: boolean;
}

/**
 * A text-to-speech voice as described by the service.
 */
export interface Voice {
    url: string;
    gender: string;
    name: string;
    language: string;
    description: string;
    customizable: boolean;
    supported_features: SupportedFeatures;
    /** Present when the voice was requested with a customization ID */
    customization?: CustomModel;
}

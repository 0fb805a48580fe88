export const APP_NAME = 'Image Classifier'
export const APP_VERSION = '1.0.0'

export const DEFAULT_PORT = 9998
export const DEFAULT_HOST = '0.0.0.0'

export const DEFAULT_MODEL_PATH = 'resources/model/classifier.onnx'
export const DEFAULT_LABELS_PATH = 'resources/model/class_names.json'
export const DEFAULT_LABELS_KEY = 'classes'

export const SUPPORTED_CONTENT_TYPES = ['image/jpeg', 'image/png'] as const

import fs from 'fs';
import path from 'path';
import protobuf from 'protobufjs';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Sources keep onnx.proto beside this module; compiled code runs from dist/src.
const PROTO_CANDIDATES = [
  path.join(__dirname, 'Onnx', 'onnx.proto'),
  path.join(__dirname, '..', '..', 'src', 'Onnx', 'onnx.proto'),
];

let modelProto: Promise<protobuf.Type> | undefined;

export function loadModelProto(): Promise<protobuf.Type> {
  if (modelProto === undefined) {
    const protoPath = PROTO_CANDIDATES.find((candidate) => fs.existsSync(candidate)) ?? PROTO_CANDIDATES[0];
    modelProto = new Promise((resolve, reject) => {
      protobuf.load(protoPath, (err, root) => {
        if (err) {
          return reject(new Error('Error loading ONNX protobuf definition: ' + err.message));
        }
        if (!root) {
          return reject(new Error('Error: ONNX protobuf root is undefined.'));
        }
        resolve(root.lookupType('onnx.ModelProto'));
      });
    });
  }
  return modelProto;
}

/** Decodes a serialized ModelProto into a plain object. */
export async function decodeModel(buffer: Uint8Array): Promise<unknown> {
  const ModelProto = await loadModelProto();
  const model = ModelProto.decode(buffer);
  return ModelProto.toObject(model, {
    longs: Number,
    enums: String,
    arrays: true,
  });
}

export async function onnx2json(onnxFilePath: string): Promise<unknown> {
  if (path.extname(onnxFilePath) !== '.onnx') {
    throw new Error('The specified file is not an ONNX file. Please provide a valid .onnx file.');
  }
  const buffer = await fs.promises.readFile(onnxFilePath);
  try {
    return await decodeModel(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error('Error loading ONNX model: ' + reason);
  }
}

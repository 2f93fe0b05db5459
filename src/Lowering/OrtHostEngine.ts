import { InferenceSession, Tensor } from 'onnxruntime-web';
import { DataType, ModelProto } from '../Onnx/OnnxTypes.js';
import { encodeModel } from '../json2onnx.js';
import { HostExecutionEngine, HostTensor, zeroTensor } from './DryRun.js';
import { DryRunFailure } from './Errors.js';

const ortTypes: [DataType, Tensor.Type][] = [
  [DataType.FLOAT, 'float32'],
  [DataType.DOUBLE, 'float64'],
  [DataType.INT8, 'int8'],
  [DataType.UINT8, 'uint8'],
  [DataType.INT16, 'int16'],
  [DataType.UINT16, 'uint16'],
  [DataType.FLOAT16, 'float16'],
  [DataType.INT32, 'int32'],
  [DataType.UINT32, 'uint32'],
  [DataType.INT64, 'int64'],
  [DataType.UINT64, 'uint64'],
  [DataType.BOOL, 'bool'],
];

function toOrtType(dataType: DataType, name: string): Tensor.Type {
  const entry = ortTypes.find(([dt]) => dt === dataType);
  if (!entry) {
    throw new DryRunFailure(`onnxruntime cannot take input '${name}' of type ${DataType[dataType]}`, name);
  }
  return entry[1];
}

function fromOrtType(type: string): DataType {
  return ortTypes.find(([, t]) => t === type)?.[0] ?? DataType.UNDEFINED;
}

/** Dry-run engine on onnxruntime-web; one session per run, released afterwards. */
export class OrtHostEngine implements HostExecutionEngine {
  async run(
    model: ModelProto,
    feeds: ReadonlyMap<string, HostTensor>,
    fetches: readonly string[],
  ): Promise<Map<string, HostTensor>> {
    const buffer = await encodeModel(model);
    const session = await InferenceSession.create(buffer);

    try {
      const ortFeeds: Record<string, Tensor> = {};
      for (const [name, tensor] of feeds) {
        const data = tensor.data ?? zeroTensor(tensor.dataType, tensor.dims, name).data;
        if (!data) {
          throw new DryRunFailure(`no data for input '${name}'`, name);
        }
        ortFeeds[name] = new Tensor(toOrtType(tensor.dataType, name), data, tensor.dims);
      }

      const results = await session.run(ortFeeds, [...fetches]);
      const outputs = new Map<string, HostTensor>();
      for (const [name, tensor] of Object.entries(results)) {
        outputs.set(name, { dataType: fromOrtType(tensor.type), dims: [...tensor.dims] });
      }
      return outputs;
    } finally {
      await session.release();
    }
  }
}

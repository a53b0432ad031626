/**
 * Activity log entries - the server returns these HTML fragments for htmx
 * requests and they are prepended to #activity-log.
 */
import type { FC } from "hono/jsx";
import type { CecDevice } from "../../cec/index.js";

type CommandResultProps = {
  readonly label: string;
  readonly success: boolean;
  readonly message: string;
  readonly timestamp: Date;
  readonly output?: string;
  readonly devices?: ReadonlyArray<CecDevice>;
  readonly requestId?: string;
};

const DeviceTable: FC<{ devices: ReadonlyArray<CecDevice> }> = ({ devices }) => (
  <table class="device-table">
    <thead>
      <tr>
        <th>#</th>
        <th>Name</th>
        <th>Address</th>
        <th>Vendor</th>
        <th>Power</th>
      </tr>
    </thead>
    <tbody>
      {devices.map((device) => (
        <tr>
          <td>{device.logicalAddress}</td>
          <td>{device.osdName ?? device.name}</td>
          <td>{device.physicalAddress ?? "—"}</td>
          <td>{device.vendor ?? "—"}</td>
          <td>{device.powerStatus}</td>
        </tr>
      ))}
    </tbody>
  </table>
);

export const CommandResult: FC<CommandResultProps> = ({
  label,
  success,
  message,
  timestamp,
  output,
  devices,
  requestId,
}) => (
  <article class={`log-entry ${success ? "success" : "error"}`}>
    <header>
      <strong>{label}</strong> <small>{timestamp.toLocaleTimeString()}</small>
    </header>
    <p>{message}</p>
    {devices && devices.length > 0 ? <DeviceTable devices={devices} /> : null}
    {output ? <pre>{output}</pre> : null}
    {requestId ? (
      <footer>
        <small>
          Request ID: <code>{requestId}</code>
        </small>
      </footer>
    ) : null}
  </article>
);

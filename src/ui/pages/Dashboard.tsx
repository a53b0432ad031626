/**
 * CEC Remote dashboard
 *
 * Server-rendered page using HTMX for interactivity.
 * Pico CSS for styling - semantic HTML looks good automatically.
 */
import type { FC } from "hono/jsx";
import type { ButtonPins } from "../../buttons/index.js";
import { BaseLayout } from "../layouts/Base.js";

/** Every command result lands at the top of the activity log */
const logTarget = {
  "hx-target": "#activity-log",
  "hx-swap": "afterbegin",
} as const;

const PowerButtons: FC = () => (
  <div class="grid">
    <button
      type="button"
      id="power-on"
      class="power-button"
      hx-post="/api/power/on"
      {...logTarget}
    >
      Power ON
    </button>
    <button
      type="button"
      id="power-off"
      class="power-button secondary"
      hx-post="/api/power/off"
      {...logTarget}
    >
      Power OFF
    </button>
  </div>
);

const QueryButtons: FC = () => (
  <div class="grid">
    <button type="button" class="outline" hx-get="/api/scan" {...logTarget}>
      Scan Devices
    </button>
    <button type="button" class="outline" hx-get="/api/status" {...logTarget}>
      Power Status
    </button>
  </div>
);

const CommandForm: FC = () => (
  <form hx-post="/api/command" {...logTarget}>
    <fieldset role="group">
      <input
        type="text"
        name="command"
        placeholder="e.g. tx 10:36"
        maxlength={64}
        required
        aria-label="CEC command"
      />
      <button type="submit">Send</button>
    </fieldset>
  </form>
);

const ButtonInfo: FC<{ pins: ButtonPins | null }> = ({ pins }) => (
  <p id="button-info">
    <small>
      {pins
        ? `Physical buttons: ON on GPIO ${pins.ON}, OFF on GPIO ${pins.OFF}`
        : "Physical buttons disabled"}
    </small>
  </p>
);

type DashboardProps = {
  appName: string;
  targetAddress: string;
  buttonPins: ButtonPins | null;
};

export const Dashboard: FC<DashboardProps> = ({
  appName,
  targetAddress,
  buttonPins,
}) => (
  <BaseLayout title={appName}>
    <hgroup>
      <h1>{appName}</h1>
      <p>HDMI-CEC control for device {targetAddress}</p>
    </hgroup>

    <section>
      <PowerButtons />
      <ButtonInfo pins={buttonPins} />
    </section>

    <section>
      <QueryButtons />
      <CommandForm />
    </section>

    <section>
      <h2>Activity</h2>
      {/* Initial scan once the page has settled */}
      <div hx-get="/api/scan" hx-trigger="load delay:1s" {...logTarget} />
      <div id="activity-log" />
    </section>

    <script src="/public/dashboard.js">{""}</script>
  </BaseLayout>
);

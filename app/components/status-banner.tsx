type BannerVariant = "info" | "warning" | "error";

interface StatusBannerProps {
  message: string;
  variant?: BannerVariant;
}

const ROLES: Record<BannerVariant, "status" | "alert"> = {
  info: "status",
  warning: "status",
  error: "alert"
};

export function StatusBanner({ message, variant = "info" }: StatusBannerProps) {
  return (
    <div className={`status-banner status-banner--${variant}`} role={ROLES[variant]}>
      <span>{message}</span>
    </div>
  );
}

export default StatusBanner;

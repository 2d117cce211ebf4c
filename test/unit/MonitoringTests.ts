import { expect } from "chai";
import { MaxUint256, parseEther } from "ethers";
import { collectEvents } from "../../scripts/monitoring/events";
import { formatHolding, getHealthStatus, getPositions, getRiskLevel, getUtilization } from "../../scripts/monitoring/positions";
import { HealthStatus, RiskLevel } from "../../scripts/monitoring/types";
import { colors, formatAddress, formatCurrency, formatCurrencyFromWei, renderTable, stripAnsi } from "../../scripts/utils/table";
import { defaultConfig } from "../../scripts/deployment/config/deploymentConfig";
import { deployEngineFixture, EngineFixture, feedPrice, fundAndApprove } from "../utils/utils";

describe("Monitoring Tests", () => {
  describe("positions", () => {
    let f: EngineFixture;

    beforeEach(() => {
      f = deployEngineFixture();
      const open = (account: string, debt: bigint) => {
        fundAndApprove(f.weth, account, f.engine.address, parseEther("10"));
        f.engine.connect(account).depositCollateralAndMintDsc(f.weth.address, parseEther("10"), debt);
      };
      open(f.bob, parseEther("1000"));
      open(f.alice, parseEther("10000"));

      fundAndApprove(f.weth, f.carol, f.engine.address, parseEther("1"));
      f.engine.connect(f.carol).depositCollateral(f.weth.address, parseEther("1"));
      f.engine.connect(f.carol).redeemCollateral(f.weth.address, parseEther("1"));
    });

    it("classifies every account, lowest health factor first", () => {
      const positions = getPositions(f.engine, [f.weth, f.wbtc]);

      expect(positions.map((p) => p.owner)).to.deep.equal([f.alice, f.bob, f.carol]);
      expect(positions.map((p) => p.status)).to.deep.equal([
        HealthStatus.WARNING,
        HealthStatus.HEALTHY,
        HealthStatus.CLOSED,
      ]);
      expect(positions.map((p) => p.riskLevel)).to.deep.equal([RiskLevel.HIGH, RiskLevel.LOW, RiskLevel.LOW]);
      expect(positions.map((p) => p.utilization)).to.deep.equal([100, 10, 0]);
      expect(positions[2].healthFactor).to.equal(MaxUint256);
    });

    it("reports holdings per collateral token", () => {
      const [alice] = getPositions(f.engine, [f.weth, f.wbtc]);

      expect(alice.collateralValueInUsd).to.equal(parseEther("20000"));
      expect(alice.debt).to.equal(parseEther("10000"));
      expect(alice.liquidatable).to.equal(false);
      expect(alice.collateral).to.deep.equal([
        { token: f.weth.address, symbol: "WETH", decimals: 18, amount: parseEther("10"), valueInUsd: parseEther("20000") },
        { token: f.wbtc.address, symbol: "WBTC", decimals: 18, amount: 0n, valueInUsd: 0n },
      ]);
    });

    it("formats holdings with the token's own decimals", () => {
      const [wethConfig, wbtcConfig] = defaultConfig.collaterals;
      const g = deployEngineFixture({ ...defaultConfig, collaterals: [wethConfig, { ...wbtcConfig, decimals: 8 }] });
      fundAndApprove(g.wbtc, g.carol, g.engine.address, 150_000_000n);
      g.engine.connect(g.carol).depositCollateral(g.wbtc.address, 150_000_000n);

      const [carol] = getPositions(g.engine, [g.weth, g.wbtc]);
      expect(carol.collateral[1].decimals).to.equal(8);
      expect(formatHolding(carol.collateral[1])).to.equal("1.5000 WBTC");
      expect(formatHolding(carol.collateral[0])).to.equal("0.0000 WETH");
    });

    it("does not read the feed of a token nobody holds", () => {
      f.network.increaseTime(10801);
      f.wethUsdPriceFeed.updateAnswer(feedPrice(2000));

      const [alice] = getPositions(f.engine, [f.weth, f.wbtc]);
      expect(alice.collateral[1].valueInUsd).to.equal(0n);
      expect(alice.collateralValueInUsd).to.equal(parseEther("20000"));
    });

    it("flags liquidatable positions after a price drop", () => {
      f.wethUsdPriceFeed.updateAnswer(feedPrice(1000));
      const [alice] = getPositions(f.engine, [f.weth, f.wbtc]);

      expect(alice.owner).to.equal(f.alice);
      expect(alice.healthFactor).to.equal(parseEther("0.5"));
      expect(alice.status).to.equal(HealthStatus.CRITICAL);
      expect(alice.riskLevel).to.equal(RiskLevel.HIGH);
      expect(alice.liquidatable).to.equal(true);
    });

    it("status and risk helpers", () => {
      expect(getHealthStatus(0n, 0n, MaxUint256)).to.equal(HealthStatus.CLOSED);
      expect(getHealthStatus(1n, 1n, parseEther("0.99"))).to.equal(HealthStatus.CRITICAL);
      expect(getHealthStatus(1n, 1n, parseEther("1.25"))).to.equal(HealthStatus.HEALTHY);
      expect(getRiskLevel(HealthStatus.HEALTHY, 75)).to.equal(RiskLevel.MEDIUM);
      expect(getUtilization(1n, 0n)).to.equal(Infinity);
      expect(getUtilization(parseEther("1"), parseEther("3"))).to.equal(33.333);
    });
  });

  describe("event collector", () => {
    it("buffers committed logs until drained", () => {
      const f = deployEngineFixture();
      const collector = collectEvents(f.engine);
      fundAndApprove(f.weth, f.alice, f.engine.address, parseEther("2"));
      f.engine.connect(f.alice).depositCollateral(f.weth.address, parseEther("2"));
      f.engine.connect(f.alice).redeemCollateral(f.weth.address, parseEther("1"));

      const drained = collector.drain();
      expect(drained.collateralDepositedEvents).to.have.length(1);
      expect(drained.collateralRedeemedEvents).to.have.length(1);
      expect(collector.events.collateralDepositedEvents).to.have.length(0);

      collector.stop();
      f.engine.connect(f.alice).redeemCollateral(f.weth.address, parseEther("1"));
      expect(collector.events.collateralRedeemedEvents).to.have.length(0);
    });
  });

  describe("table", () => {
    const data = [
      { name: "b", qty: 20 },
      { name: "a", qty: 3 },
    ];
    const columns = [
      { header: "Name", width: 6, format: (row: { name: string }) => row.name },
      { header: "Qty", width: 5, align: "right" as const, format: (row: { qty: number }) => String(row.qty) },
    ];

    it("renders header, separator and sorted rows", () => {
      const lines = renderTable(data, { columns, sort: (x, y) => x.qty - y.qty });

      expect(lines.map(stripAnsi)).to.deep.equal([
        "Name      Qty",
        "-------------",
        "a" + " ".repeat(11) + "3",
        "b" + " ".repeat(10) + "20",
      ]);
    });

    it("dims rows and hides columns", () => {
      const lines = renderTable(data, {
        columns: [columns[0], { ...columns[1], visible: false }],
        showHeader: false,
        showHeaderSeparator: false,
        shouldDimRow: (row) => row.qty > 10,
      });

      expect(lines).to.deep.equal([`${colors.dim}b${colors.reset}     `, "a     "]);
    });

    it("formats numbers and addresses", () => {
      expect(formatCurrency(1234567.891)).to.equal("1'234'567.89");
      expect(formatCurrencyFromWei(parseEther("15000"))).to.equal("15'000.00");
      expect(formatAddress("0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed")).to.equal("0x5aAe...eAed");
    });
  });
});
